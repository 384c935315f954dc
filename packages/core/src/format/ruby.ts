/**
 * Ruby formatter: `end`-terminated blocks and brace blocks.
 */

import { type IndentOptions, type LinePlanner, reindent, startsWithWord } from './lines.ts'

const OPENERS = [
	'def',
	'class',
	'module',
	'if',
	'unless',
	'case',
	'while',
	'until',
	'for',
	'begin',
	'do',
] as const

const MID_BLOCK = ['elsif', 'else', 'when', 'rescue', 'ensure'] as const

const ASSIGNED_OPENER = /=\s*(?:if|unless|case|while|until|begin)\b/
const BLOCK_PARAMS = /(?:\bdo|\{)\s*\|[^|]*\|$/
const ENDLESS_DEF = /^def\s+[\w.]+[?!]?(?:\([^)]*\))?\s*=(?![=~>])/

function endsWithWord(text: string, word: string): boolean {
	return text === word || text.endsWith(` ${word}`) || text.endsWith(`\t${word}`)
}

function opensRubyBlock(trimmed: string): boolean {
	if (ENDLESS_DEF.test(trimmed)) return false
	if (endsWithWord(trimmed, 'end')) return false
	if (trimmed.includes(' then ') && !trimmed.endsWith(' then')) return false

	return (
		OPENERS.some((word) => startsWithWord(trimmed, word) || endsWithWord(trimmed, word)) ||
		BLOCK_PARAMS.test(trimmed) ||
		trimmed.endsWith('{') ||
		ASSIGNED_OPENER.test(trimmed)
	)
}

class RubyPlanner implements LinePlanner {
	private level = 0

	next(trimmed: string): number {
		if (trimmed.startsWith('#')) return this.level

		if (MID_BLOCK.some((word) => startsWithWord(trimmed, word))) {
			return Math.max(0, this.level - 1)
		}
		if (startsWithWord(trimmed, 'end') || trimmed.startsWith('}')) {
			this.level = Math.max(0, this.level - 1)
		}

		const printLevel = this.level
		if (opensRubyBlock(trimmed)) this.level++
		return printLevel
	}
}

export function formatRuby(code: string, options: IndentOptions): string {
	return reindent(code, options, new RubyPlanner())
}
