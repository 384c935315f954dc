/**
 * CLI diagnostic definitions.
 *
 * Error code format: TLCLI<NUMBER>
 * - TLCLI: CLI errors (001-099)
 */

import { type DiagnosticDef, DiagnosticSeverity } from './types.ts'

// =============================================================================
// CLI ERRORS (TLCLI001-099)
// =============================================================================

export const TLCLI001: DiagnosticDef = {
	code: 'TLCLI001',
	description: "There's no file at the path you gave.",
	message: 'file not found: {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Double-check the path and make sure the file exists.',
}

export const TLCLI002: DiagnosticDef = {
	code: 'TLCLI002',
	description: 'The file exists but could not be opened.',
	message: 'cannot read file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have read permission for this file.',
}

export const TLCLI003: DiagnosticDef = {
	code: 'TLCLI003',
	description: 'The formatted output could not be written back.',
	message: 'cannot write file: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Check that you have write permission for the file, or drop --write.',
}

export const TLCLI004: DiagnosticDef = {
	code: 'TLCLI004',
	description: "The language name isn't one tintline knows.",
	message: 'unknown language "{language}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Run `tintline languages` to see the supported identifiers.',
}

export const TLCLI005: DiagnosticDef = {
	code: 'TLCLI005',
	description: 'Indentation has to be at least one column wide.',
	message: 'invalid indent size "{value}"',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Pass a whole number between 1 and 16 to --indent-size.',
}

export const TLCLI006: DiagnosticDef = {
	code: 'TLCLI006',
	description: "The file's extension doesn't map to a supported language.",
	message: 'cannot detect language for {path}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Name the language explicitly with --language.',
}

export const TLCLI007: DiagnosticDef = {
	code: 'TLCLI007',
	description: 'One of the TINTLINE_* environment variables has a value tintline cannot use.',
	message: 'invalid environment configuration: {reason}',
	severity: DiagnosticSeverity.Error,
	suggestion: 'Fix or unset the variable named above.',
}

// =============================================================================
// CATALOG
// =============================================================================

export const CLI_DIAGNOSTICS = {
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
	TLCLI006,
	TLCLI007,
} as const

export type CliDiagnosticCode = keyof typeof CLI_DIAGNOSTICS
