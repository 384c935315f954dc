/**
 * Grammar lint diagnostic definitions.
 *
 * Error code format: TLGRAM<NUMBER>
 * - TLGRAM: grammar authoring issues (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// RULE ISSUES (TLGRAM001-019)
// =============================================================================

export const TLGRAM001: DiagnosticDef = {
	code: 'TLGRAM001',
	description:
		'A rule that can match the empty string never advances the scanner. The engine skips such matches, so the rule silently does nothing where it matters.',
	message: "rule #{index} /{pattern}/ can match the empty string",
	severity: DiagnosticSeverity.Error,
	suggestion: 'Replace `*` or `?` on the whole pattern with `+`, or anchor it to at least one character.',
}

export const TLGRAM002: DiagnosticDef = {
	code: 'TLGRAM002',
	description: 'Two rules have the same pattern and flags. Only one of them can ever win.',
	message: 'rule #{index} duplicates rule #{other} (/{pattern}/)',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Remove one of them, or merge their token types.',
}

// =============================================================================
// KEYWORD ISSUES (TLGRAM020-039)
// =============================================================================

export const TLGRAM020: DiagnosticDef = {
	code: 'TLGRAM020',
	description:
		'Keywords only reclassify identifier tokens. No identifier rule in this grammar matches the whole keyword.',
	message: 'keyword "{keyword}" cannot be produced by any identifier rule',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Widen the identifier pattern or drop the keyword from the table.',
}

export const TLGRAM021: DiagnosticDef = {
	code: 'TLGRAM021',
	description: 'The grammar has a keyword table but no rule of type Identifier, so the table is never consulted.',
	message: 'keyword table has no identifier rule to act on',
	severity: DiagnosticSeverity.Warning,
	suggestion: 'Add an identifier rule or remove the keyword table.',
}

export const TLGRAM022: DiagnosticDef = {
	code: 'TLGRAM022',
	description:
		'A higher-priority rule wins over the identifier rule for this keyword, so the table entry is not what colours it.',
	message: 'keyword "{keyword}" is tokenized as {actual} instead of {expected}',
	severity: DiagnosticSeverity.Info,
}

// =============================================================================
// CATALOG
// =============================================================================

export const GRAMMAR_DIAGNOSTICS = {
	TLGRAM001,
	TLGRAM002,
	TLGRAM020,
	TLGRAM021,
	TLGRAM022,
} as const

export type GrammarDiagnosticCode = keyof typeof GRAMMAR_DIAGNOSTICS
