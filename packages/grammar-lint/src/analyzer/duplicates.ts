import type { Grammar } from '@tintline/core'
import type { LintIssue } from '../types.ts'
import { createIssue } from './issue.ts'

// The engine drops g and y, so they do not make two rules differ
function ruleKey(pattern: RegExp): string {
	const flags = [...pattern.flags.replace(/[gy]/g, '')].sort().join('')
	return `/${pattern.source}/${flags}`
}

export function analyzeDuplicates(grammar: Grammar): LintIssue[] {
	const firstIndex = new Map<string, number>()
	const issues: LintIssue[] = []

	grammar.rules.forEach((rule, index) => {
		const key = ruleKey(rule.pattern)
		const other = firstIndex.get(key)
		if (other === undefined) {
			firstIndex.set(key, index)
			return
		}
		issues.push(
			createIssue(
				'TLGRAM002',
				`#${index}`,
				{ index, other, pattern: rule.pattern.source },
				`Rules #${other} and #${index} share a pattern. Only the higher priority one ever produces tokens.`
			)
		)
	})

	return issues
}
