import { isSupportedLanguage, parseLanguage, type SupportedLanguage } from '@tintline/core'
import { z } from 'zod'

/** Raised when a TINTLINE_* variable fails validation. */
export class ConfigError extends Error {
	constructor(message: string) {
		super(message)
		this.name = 'ConfigError'
	}
}

const TRUTHY = ['1', 'true', 'yes', 'on'] as const
const FALSY = ['0', 'false', 'no', 'off'] as const
const TRUTHY_VALUES: ReadonlySet<string> = new Set(TRUTHY)

const booleanish = z
	.string()
	.trim()
	.toLowerCase()
	.pipe(z.enum([...TRUTHY, ...FALSY]))
	.transform((value) => TRUTHY_VALUES.has(value))

const languageName = z
	.string()
	.trim()
	.transform((value, ctx) => {
		const language = parseLanguage(value)
		if (language === undefined || !isSupportedLanguage(language)) {
			ctx.issues.push({ code: 'custom', input: value, message: `unknown language "${value}"` })
			return z.NEVER
		}
		return language
	})

const EnvSchema = z.object({
	TINTLINE_INDENT_SIZE: z.coerce.number().int().min(1).max(16).default(4),
	TINTLINE_LANGUAGE: languageName.optional(),
	TINTLINE_USE_TABS: booleanish.default(false),
})

export interface CliConfig {
	readonly indentSize: number
	readonly useTabs: boolean
	/** Used when a file's extension does not identify its language. */
	readonly language: SupportedLanguage | undefined
}

// Empty variables count as unset
function definedEntries(env: NodeJS.ProcessEnv): Record<string, string> {
	const entries: Record<string, string> = {}
	for (const [key, value] of Object.entries(env)) {
		if (value !== undefined && value.trim() !== '') entries[key] = value
	}
	return entries
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CliConfig {
	const result = EnvSchema.safeParse(definedEntries(env))
	if (!result.success) {
		throw new ConfigError(z.prettifyError(result.error))
	}
	return {
		indentSize: result.data.TINTLINE_INDENT_SIZE,
		language: result.data.TINTLINE_LANGUAGE,
		useTabs: result.data.TINTLINE_USE_TABS,
	}
}
