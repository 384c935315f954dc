export { analyzeDuplicates } from './analyzer/duplicates.ts'
export { analyzeKeywords } from './analyzer/keywords.ts'
export { analyzeZeroLength, findZeroLengthRules } from './analyzer/zero-length.ts'
export { hasErrors, lintGrammar, lintLanguages, reportResults } from './lint.ts'
export { createJsonReporter, JsonReporter } from './reporters/json.ts'
export { createSpecReporter, SpecReporter } from './reporters/spec.ts'
export type { LintIssue, LintResult, LintSeverity, LintStats, Reporter } from './types.ts'
