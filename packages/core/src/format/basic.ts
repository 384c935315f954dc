/**
 * Visual Basic formatter.
 * Blocks are keyword delimited; matching ignores case and respects word boundaries.
 */

import { type IndentOptions, type LinePlanner, reindent } from './lines.ts'

const MODIFIERS = new Set([
	'async',
	'custom',
	'declare',
	'default',
	'friend',
	'iterator',
	'mustinherit',
	'mustoverride',
	'narrowing',
	'notinheritable',
	'notoverridable',
	'overloads',
	'overridable',
	'overrides',
	'partial',
	'private',
	'protected',
	'public',
	'readonly',
	'shadows',
	'shared',
	'static',
	'widening',
	'writeonly',
])

const OPENERS = new Set([
	'class',
	'do',
	'enum',
	'for',
	'function',
	'get',
	'if',
	'interface',
	'module',
	'namespace',
	'operator',
	'property',
	'select',
	'set',
	'structure',
	'sub',
	'synclock',
	'try',
	'using',
	'while',
	'with',
])

const CLOSER =
	/^(?:end\s+(?:sub|function|if|while|select|try|with|using|synclock|class|structure|module|namespace|interface|enum|property|get|set|operator)|next|wend|loop)\b/i

const MID_BLOCK = /^(?:else|elseif|case|catch|finally)\b/i

// `Then` as the last word, ignoring a trailing comment.
const THEN_AT_END = /\bthen\s*(?:'.*)?$/i

interface Declaration {
	readonly modifiers: ReadonlySet<string>
	readonly keyword: string
	readonly rest: string
}

function readDeclaration(trimmed: string): Declaration {
	const modifiers = new Set<string>()
	let rest = trimmed
	for (;;) {
		const match = /^(\w+)\s+/.exec(rest)
		const word = match?.[1]?.toLowerCase()
		if (match === null || word === undefined || !MODIFIERS.has(word)) break
		modifiers.add(word)
		rest = rest.slice(match[0].length)
	}
	const keyword = /^\w+/.exec(rest)?.[0].toLowerCase() ?? ''
	return { keyword, modifiers, rest }
}

function opensBlock(trimmed: string): boolean {
	const { keyword, modifiers, rest } = readDeclaration(trimmed)
	if (!OPENERS.has(keyword)) return false
	if (modifiers.has('mustoverride') || modifiers.has('declare')) return false

	switch (keyword) {
		case 'if':
			return THEN_AT_END.test(rest)
		case 'property':
			return (
				/^property\s+\w+\s*\(/i.test(rest) ||
				modifiers.has('readonly') ||
				modifiers.has('writeonly')
			)
		case 'get':
		case 'set':
			return !/^\w+\s*=/.test(rest)
		default:
			return true
	}
}

class BasicPlanner implements LinePlanner {
	private level = 0

	next(trimmed: string): number {
		if (CLOSER.test(trimmed)) {
			this.level = Math.max(0, this.level - 1)
			return this.level
		}
		if (MID_BLOCK.test(trimmed)) {
			return Math.max(0, this.level - 1)
		}

		const printLevel = this.level
		if (opensBlock(trimmed)) this.level++
		return printLevel
	}
}

export function formatVisualBasic(code: string, options: IndentOptions): string {
	return reindent(code, options, new BasicPlanner())
}
