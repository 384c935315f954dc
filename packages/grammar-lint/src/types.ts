import type { Language } from '@tintline/core'
import type { GrammarDiagnosticCode, SeverityLabel } from '@tintline/diagnostics'

export type LintSeverity = SeverityLabel

export interface LintIssue {
	/** `#<index>` for rule issues, the word for keyword issues. */
	rule: string
	severity: LintSeverity
	code: GrammarDiagnosticCode
	message: string
	aiHint: string | undefined
}

export interface LintStats {
	ruleCount: number
	keywordCount: number
	zeroLengthRules: number[]
}

export interface LintResult {
	language: Language
	issues: LintIssue[]
	stats: LintStats
}

export interface Reporter {
	onGrammarStart(language: Language): void
	onIssue(issue: LintIssue): void
	onGrammarEnd(result: LintResult): void
	getOutput(): string
}
