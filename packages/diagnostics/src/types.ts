/**
 * Diagnostic severity levels.
 */
export const DiagnosticSeverity = {
	Error: 0,
	Info: 2,
	Warning: 1,
} as const

export type DiagnosticSeverity = (typeof DiagnosticSeverity)[keyof typeof DiagnosticSeverity]

const SEVERITY_LABELS = {
	[DiagnosticSeverity.Error]: 'error',
	[DiagnosticSeverity.Info]: 'info',
	[DiagnosticSeverity.Warning]: 'warning',
} as const satisfies Record<DiagnosticSeverity, string>

export type SeverityLabel = (typeof SEVERITY_LABELS)[DiagnosticSeverity]

export function severityLabel(severity: DiagnosticSeverity): SeverityLabel {
	return SEVERITY_LABELS[severity]
}

/**
 * Diagnostic definition in the catalog.
 */
export interface DiagnosticDef {
	readonly code: string
	readonly severity: DiagnosticSeverity
	readonly message: string
	readonly description: string
	readonly suggestion?: string
}

/**
 * Template arguments for diagnostic messages.
 */
export type DiagnosticArgs = Record<string, string | number>
