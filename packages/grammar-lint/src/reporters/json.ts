import type { Language } from '@tintline/core'
import type { LintIssue, LintResult, Reporter } from '../types.ts'

interface JsonIssue {
	rule: string
	severity: string
	code: string
	message: string
	aiHint: string | undefined
}

interface JsonGrammarResult {
	language: Language
	passed: boolean
	ruleCount: number
	keywordCount: number
	zeroLengthRules: number[]
	issues: JsonIssue[]
}

export class JsonReporter implements Reporter {
	private currentIssues: JsonIssue[] | undefined
	private grammars: JsonGrammarResult[] = []

	onGrammarStart(_language: Language): void {
		this.currentIssues = []
	}

	onIssue(issue: LintIssue): void {
		if (this.currentIssues === undefined) return

		this.currentIssues.push({
			aiHint: issue.aiHint ?? generateAiHint(issue),
			code: issue.code,
			message: issue.message,
			rule: issue.rule,
			severity: issue.severity,
		})
	}

	onGrammarEnd(result: LintResult): void {
		if (this.currentIssues === undefined) return

		this.grammars.push({
			issues: this.currentIssues,
			keywordCount: result.stats.keywordCount,
			language: result.language,
			passed: !this.currentIssues.some((issue) => issue.severity === 'error'),
			ruleCount: result.stats.ruleCount,
			zeroLengthRules: result.stats.zeroLengthRules,
		})
		this.currentIssues = undefined
	}

	getOutput(): string {
		return JSON.stringify({ grammars: this.grammars }, null, 2)
	}
}

function generateAiHint(issue: LintIssue): string {
	return `Inspect ${issue.rule} in the grammar definition: ${issue.message}`
}

export function createJsonReporter(): JsonReporter {
	return new JsonReporter()
}
