import { type Grammar, stickyPattern } from '@tintline/core'
import type { LintIssue } from '../types.ts'
import { createIssue } from './issue.ts'

// Every position of every sample is tried, end of string included
const SAMPLES = [
	'',
	' ',
	'\t',
	'\n',
	'a',
	'Z',
	'_',
	'0',
	'"',
	"'",
	'`',
	'/',
	'#',
	'<',
	'>',
	'{',
	'}',
	'@',
	'$',
	'-',
	'a b\n1 "x" // y',
] as const

function matchesEmpty(pattern: RegExp): boolean {
	const matcher = stickyPattern(pattern)
	return SAMPLES.some((sample) => {
		for (let position = 0; position <= sample.length; position++) {
			matcher.lastIndex = position
			const result = matcher.exec(sample)
			if (result !== null && result[0].length === 0) return true
		}
		return false
	})
}

/** Indices of rules that can match the empty string. */
export function findZeroLengthRules(grammar: Grammar): number[] {
	return grammar.rules.flatMap((rule, index) => (matchesEmpty(rule.pattern) ? [index] : []))
}

export function analyzeZeroLength(grammar: Grammar): LintIssue[] {
	return findZeroLengthRules(grammar).map((index) => {
		const pattern = grammar.rules[index]?.pattern.source ?? ''
		return createIssue(
			'TLGRAM001',
			`#${index}`,
			{ index, pattern },
			`Rule #${index} never advances the scanner. Make /${pattern}/ consume at least one character.`
		)
	})
}
