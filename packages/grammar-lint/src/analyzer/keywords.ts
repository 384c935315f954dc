import { type Grammar, stickyPattern, TokenType, tokenize } from '@tintline/core'
import type { LintIssue } from '../types.ts'
import { createIssue } from './issue.ts'

function matchesWhole(matcher: RegExp, word: string): boolean {
	matcher.lastIndex = 0
	const result = matcher.exec(word)
	return result !== null && result[0].length === word.length
}

/** Type of the single token the word lexes to, or the joined types when it splits. */
function tokenizedAs(word: string, grammar: Grammar): string {
	return Array.from(tokenize(word, grammar), (token) => token.type).join('+')
}

function shadowedIssue(keyword: string, actual: string, expected: TokenType): LintIssue {
	return createIssue(
		'TLGRAM022',
		keyword,
		{ actual, expected, keyword },
		`"${keyword}" is matched by a rule that outranks the identifier rule. Lower that rule's priority if the keyword colour should apply.`
	)
}

export function analyzeKeywords(grammar: Grammar): LintIssue[] {
	const table = grammar.keywords
	if (table === undefined || table.size === 0) return []

	const matchers = grammar.rules
		.filter((rule) => rule.type === TokenType.Identifier)
		.map((rule) => stickyPattern(rule.pattern))

	if (matchers.length === 0) {
		return [
			createIssue(
				'TLGRAM021',
				'keywords',
				{},
				`${grammar.language} has ${table.size} keywords but nothing is ever classified as Identifier.`
			),
		]
	}

	const issues: LintIssue[] = []
	for (const [keyword, expected] of table.entries()) {
		if (!matchers.some((matcher) => matchesWhole(matcher, keyword))) {
			issues.push(
				createIssue(
					'TLGRAM020',
					keyword,
					{ keyword },
					`No Identifier rule matches "${keyword}" in full. Check its characters against the identifier pattern.`
				)
			)
			continue
		}

		const actual = tokenizedAs(keyword, grammar)
		if (actual !== expected) issues.push(shadowedIssue(keyword, actual, expected))
	}
	return issues
}
