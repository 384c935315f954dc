import { type Grammar, grammarFor, SUPPORTED_LANGUAGES, type SupportedLanguage } from '@tintline/core'
import { analyzeDuplicates } from './analyzer/duplicates.ts'
import { analyzeKeywords } from './analyzer/keywords.ts'
import { analyzeZeroLength, findZeroLengthRules } from './analyzer/zero-length.ts'
import type { LintResult, Reporter } from './types.ts'

export function lintGrammar(grammar: Grammar): LintResult {
	return {
		issues: [...analyzeZeroLength(grammar), ...analyzeDuplicates(grammar), ...analyzeKeywords(grammar)],
		language: grammar.language,
		stats: {
			keywordCount: grammar.keywords?.size ?? 0,
			ruleCount: grammar.rules.length,
			zeroLengthRules: findZeroLengthRules(grammar),
		},
	}
}

export function lintLanguages(languages: readonly SupportedLanguage[] = SUPPORTED_LANGUAGES): LintResult[] {
	return languages.map((language) => lintGrammar(grammarFor(language)))
}

export function hasErrors(results: readonly LintResult[]): boolean {
	return results.some((result) => result.issues.some((issue) => issue.severity === 'error'))
}

export function reportResults(results: readonly LintResult[], reporter: Reporter): string {
	for (const result of results) {
		reporter.onGrammarStart(result.language)
		for (const issue of result.issues) {
			reporter.onIssue(issue)
		}
		reporter.onGrammarEnd(result)
	}
	return reporter.getOutput()
}
