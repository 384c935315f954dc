import type { DiagnosticArgs, DiagnosticDef } from './types.ts'

/**
 * Interpolate template arguments into a message.
 * Replaces {key} with the corresponding value from args; unknown keys stay as written.
 */
export function interpolateMessage(message: string, args?: DiagnosticArgs): string {
	if (!args) return message
	return message.replace(/\{(\w+)\}/g, (_, key: string) => {
		const value = args[key]
		return value !== undefined ? String(value) : `{${key}}`
	})
}

/** Renders a catalog entry as `[CODE] message`. */
export function formatDiagnostic(def: DiagnosticDef, args?: DiagnosticArgs): string {
	return `[${def.code}] ${interpolateMessage(def.message, args)}`
}

/** The entry's suggestion with the same arguments applied, if it has one. */
export function formatSuggestion(def: DiagnosticDef, args?: DiagnosticArgs): string | undefined {
	return def.suggestion === undefined ? undefined : interpolateMessage(def.suggestion, args)
}
