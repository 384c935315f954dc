import {
	detectLanguage,
	formatterFamily,
	isSupportedLanguage,
	parseLanguage,
	SUPPORTED_LANGUAGES,
	type SupportedLanguage,
	type Token,
	tokenEnd,
	tokenText,
} from '@tintline/core'
import {
	formatDiagnostic,
	TLCLI001,
	TLCLI002,
	TLCLI003,
	TLCLI004,
	TLCLI005,
	TLCLI006,
	TLCLI007,
} from '@tintline/diagnostics'

export type LanguageResolution =
	| { readonly ok: true; readonly language: SupportedLanguage }
	| { readonly ok: false; readonly error: string }

export interface TextRange {
	readonly start: number
	readonly length: number
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
	return error instanceof Error && 'code' in error
}

export function getErrorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

export function formatReadError(filePath: string, error: unknown): string {
	if (isNodeError(error) && error.code === 'ENOENT') {
		return formatDiagnostic(TLCLI001, { path: filePath })
	}
	return formatDiagnostic(TLCLI002, { reason: getErrorMessage(error) })
}

export function formatWriteError(error: unknown): string {
	return formatDiagnostic(TLCLI003, { reason: getErrorMessage(error) })
}

export function formatConfigError(error: unknown): string {
	return formatDiagnostic(TLCLI007, { reason: getErrorMessage(error) })
}

/**
 * `--language` wins; otherwise the file name decides, then the configured default.
 */
export function resolveLanguage(
	filePath: string,
	name: string | undefined,
	fallback: SupportedLanguage | undefined
): LanguageResolution {
	if (name !== undefined) {
		const language = parseLanguage(name)
		if (language === undefined || !isSupportedLanguage(language)) {
			return { error: formatDiagnostic(TLCLI004, { language: name }), ok: false }
		}
		return { language, ok: true }
	}

	const detected = detectLanguage(filePath)
	if (isSupportedLanguage(detected)) return { language: detected, ok: true }
	if (fallback !== undefined) return { language: fallback, ok: true }

	return { error: formatDiagnostic(TLCLI006, { path: filePath }), ok: false }
}

export function isValidIndentSize(value: number): boolean {
	return Number.isInteger(value) && value >= 1 && value <= 16
}

export function formatIndentSizeError(value: number): string {
	return formatDiagnostic(TLCLI005, { value })
}

/** Parses `start:length`. */
export function parseRange(value: string): TextRange | undefined {
	const match = /^(\d+):(\d+)$/.exec(value.trim())
	if (match === null) return undefined
	return { length: Number(match[2]), start: Number(match[1]) }
}

export function formatTokenLine(token: Token, source: string): string {
	return `${token.start}..${tokenEnd(token)} ${token.type} ${JSON.stringify(tokenText(token, source))}`
}

export function formatTokensJson(tokens: readonly Token[], source: string): string {
	const entries = tokens.map((token) => ({
		length: token.length,
		start: token.start,
		text: tokenText(token, source),
		type: token.type,
	}))
	return JSON.stringify(entries, null, 2)
}

export function formatLanguageTable(languages: readonly SupportedLanguage[] = SUPPORTED_LANGUAGES): string[] {
	const width = Math.max(...languages.map((language) => language.length))
	return languages.map((language) => `${language.padEnd(width)}  ${formatterFamily(language)}`)
}
