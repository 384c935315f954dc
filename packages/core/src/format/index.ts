/**
 * Structural reformatter.
 * Re-derives indentation from braces, keywords or tags; never parses and never throws.
 */

import { Language } from '../core/language.ts'
import { formatVisualBasic } from './basic.ts'
import { formatCStyle, formatGo } from './brace.ts'
import { formatCss } from './css.ts'
import { formatDockerfile } from './dockerfile.ts'
import { formatPython, formatYaml } from './indentation.ts'
import { formatJson } from './json.ts'
import type { IndentOptions } from './lines.ts'
import { formatHtml, formatXml } from './markup.ts'
import { formatRuby } from './ruby.ts'
import { formatBash, formatPowerShell } from './shell.ts'
import { formatSql, SqlDialect } from './sql.ts'

export const FormatterFamily = {
	Brace: 'brace',
	BraceGo: 'brace-go',
	BraceMarkup: 'brace-markup',
	Continuation: 'continuation',
	Indentation: 'indentation',
	KeywordBlock: 'keyword-block',
	Markup: 'markup',
	PassThrough: 'pass-through',
	Structural: 'structural',
} as const

export type FormatterFamily = (typeof FormatterFamily)[keyof typeof FormatterFamily]

export function formatterFamily(language: Language): FormatterFamily {
	switch (language) {
		case Language.CSharp:
		case Language.Java:
		case Language.JavaScript:
		case Language.TypeScript:
		case Language.C:
		case Language.Cpp:
		case Language.Php:
		case Language.Rust:
		case Language.Kotlin:
		case Language.Swift:
		case Language.Scala:
		case Language.Dart:
		case Language.Groovy:
		case Language.ObjectiveC:
		case Language.R:
			return FormatterFamily.Brace
		case Language.Go:
			return FormatterFamily.BraceGo
		case Language.Python:
		case Language.Yaml:
			return FormatterFamily.Indentation
		case Language.VisualBasic:
		case Language.MsSql:
		case Language.OracleSql:
		case Language.Ruby:
		case Language.Bash:
		case Language.PowerShell:
			return FormatterFamily.KeywordBlock
		case Language.Html:
		case Language.Xml:
			return FormatterFamily.Markup
		case Language.Css:
		case Language.Scss:
			return FormatterFamily.BraceMarkup
		case Language.Json:
			return FormatterFamily.Structural
		case Language.Dockerfile:
			return FormatterFamily.Continuation
		case Language.Markdown:
		case Language.Lua:
		case Language.FSharp:
		case Language.Haskell:
		case Language.Elixir:
		case Language.Toml:
		case Language.GraphQL:
		case Language.None:
			return FormatterFamily.PassThrough
		default:
			return language satisfies never
	}
}

function dispatch(code: string, language: Language, options: IndentOptions): string {
	switch (language) {
		case Language.CSharp:
			return formatCStyle(code, options, { verbatim: true })
		case Language.Rust:
			return formatCStyle(code, options, { lifetimes: true })
		case Language.Java:
		case Language.JavaScript:
		case Language.TypeScript:
		case Language.C:
		case Language.Cpp:
		case Language.Php:
		case Language.Kotlin:
		case Language.Swift:
		case Language.Scala:
		case Language.Dart:
		case Language.Groovy:
		case Language.ObjectiveC:
		case Language.R:
			return formatCStyle(code, options)
		case Language.Go:
			return formatGo(code, options)
		case Language.Python:
			return formatPython(code, options)
		case Language.Yaml:
			return formatYaml(code, options)
		case Language.VisualBasic:
			return formatVisualBasic(code, options)
		case Language.MsSql:
			return formatSql(code, options, SqlDialect.MsSql)
		case Language.OracleSql:
			return formatSql(code, options, SqlDialect.Oracle)
		case Language.Ruby:
			return formatRuby(code, options)
		case Language.Bash:
			return formatBash(code, options)
		case Language.PowerShell:
			return formatPowerShell(code, options)
		case Language.Html:
			return formatHtml(code, options)
		case Language.Xml:
			return formatXml(code, options)
		case Language.Css:
		case Language.Scss:
			return formatCss(code, options)
		case Language.Json:
			return formatJson(code, options)
		case Language.Dockerfile:
			return formatDockerfile(code, options)
		case Language.Markdown:
		case Language.Lua:
		case Language.FSharp:
		case Language.Haskell:
		case Language.Elixir:
		case Language.Toml:
		case Language.GraphQL:
		case Language.None:
			return code
		default:
			return language satisfies never
	}
}

/**
 * Reformats code for a language.
 * An indentSize below 1 counts as 1; the indent unit is indentSize spaces, or one tab.
 */
export function format(code: string, language: Language, indentSize = 4, useSpaces = true): string {
	if (code.length === 0) return code
	const size = Number.isFinite(indentSize) ? Math.max(1, Math.floor(indentSize)) : 1
	return dispatch(code, language, { indentSize: size, useSpaces })
}

export { countBraces, hasOnlyClosingParens } from './brace.ts'
export { leadingWidth } from './indentation.ts'
export type { IndentOptions } from './lines.ts'
export { SqlDialect } from './sql.ts'
