import type { Language } from '@tintline/core'
import type { LintIssue, LintResult, LintSeverity, Reporter } from '../types.ts'

const MARKERS = {
	error: '\u2717',
	info: '-',
	warning: '!',
} as const satisfies Record<LintSeverity, string>

function formatIssueLine(issue: LintIssue): string {
	return `    ${MARKERS[issue.severity]} [${issue.severity}] ${issue.code} ${issue.message}`
}

export class SpecReporter implements Reporter {
	private lines: string[] = []
	private passing = 0
	private failing = 0
	private currentHasError = false

	onGrammarStart(language: Language): void {
		this.lines.push(`\n  ${language}`)
		this.currentHasError = false
	}

	onIssue(issue: LintIssue): void {
		this.lines.push(formatIssueLine(issue))
		if (issue.severity === 'error') this.currentHasError = true
	}

	onGrammarEnd(result: LintResult): void {
		if (this.currentHasError) {
			this.failing++
			return
		}
		this.passing++
		const { keywordCount, ruleCount } = result.stats
		this.lines.push(`    \u2713 ${ruleCount} rules, ${keywordCount} keywords`)
	}

	getOutput(): string {
		const summary = ['', `  ${this.passing} passing`]
		if (this.failing > 0) {
			summary.push(`  ${this.failing} failing`)
		}
		return [...this.lines, ...summary].join('\n')
	}
}

export function createSpecReporter(): SpecReporter {
	return new SpecReporter()
}
