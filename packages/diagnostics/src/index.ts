/**
 * @tintline/diagnostics
 *
 * Shared diagnostic types and definitions for tintline packages.
 */

export {
	CLI_DIAGNOSTICS,
	type CliDiagnosticCode,
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
	TLCLI006,
	TLCLI007,
} from './cli.ts'
export {
	GRAMMAR_DIAGNOSTICS,
	type GrammarDiagnosticCode,
	TLGRAM001,
	TLGRAM002,
	TLGRAM020,
	TLGRAM021,
	TLGRAM022,
} from './grammar.ts'
export { formatDiagnostic, formatSuggestion, interpolateMessage } from './interpolate.ts'
export {
	type DiagnosticArgs,
	type DiagnosticDef,
	DiagnosticSeverity,
	type DiagnosticSeverity as DiagnosticSeverityType,
	type SeverityLabel,
	severityLabel,
} from './types.ts'

import { CLI_DIAGNOSTICS } from './cli.ts'
import { GRAMMAR_DIAGNOSTICS } from './grammar.ts'

/**
 * All diagnostics from all packages.
 */
export const DIAGNOSTICS = {
	...GRAMMAR_DIAGNOSTICS,
	...CLI_DIAGNOSTICS,
} as const

/**
 * All valid diagnostic codes.
 */
export type DiagnosticCode = keyof typeof DIAGNOSTICS

/**
 * Get a diagnostic definition by code.
 */
export function getDiagnostic(code: DiagnosticCode): (typeof DIAGNOSTICS)[typeof code] {
	return DIAGNOSTICS[code]
}

/**
 * Check if a code is a valid diagnostic code.
 */
export function isValidDiagnosticCode(code: string): code is DiagnosticCode {
	return code in DIAGNOSTICS
}
