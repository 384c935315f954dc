import { describe, it } from 'node:test'
import fc from 'fast-check'
import { Language } from '../../src/core/language.ts'
import { format } from '../../src/format/index.ts'

const ALL_LANGUAGES = Object.values(Language)

// Families whose output depends only on trimmed line content.
const CONTENT_DRIVEN = [
	Language.CSharp,
	Language.Go,
	Language.VisualBasic,
	Language.MsSql,
	Language.OracleSql,
	Language.Ruby,
	Language.Bash,
	Language.PowerShell,
	Language.Html,
	Language.Xml,
	Language.Css,
	Language.Dockerfile,
] as const

const sourceLike = fc
	.array(
		fc.constantFrom(
			'{',
			'}',
			'(',
			')',
			'"',
			'@"',
			'`',
			'/*',
			'*/',
			'//',
			' ',
			'\t',
			'\n',
			'\r\n',
			'if ',
			'end',
			'BEGIN',
			'END',
			'<div>',
			'</div>',
			'\\',
			'x'
		),
		{ maxLength: 60 }
	)
	.map((parts) => parts.join(''))

describe('format properties', () => {
	it('never throws for any language', () => {
		fc.assert(
			fc.property(fc.oneof(fc.string(), sourceLike), fc.constantFrom(...ALL_LANGUAGES), (code, language) => {
				format(code, language)
				return true
			}),
			{ numRuns: 1000 }
		)
	})

	it('is idempotent for content-driven families', () => {
		fc.assert(
			fc.property(sourceLike, fc.constantFrom(...CONTENT_DRIVEN), (code, language) => {
				const once = format(code, language, 2)
				return format(once, language, 2) === once
			}),
			{ numRuns: 500 }
		)
	})

	// YAML reads its input in two-column steps, so a wider unit is not stable.
	it('is idempotent for indentation-significant families at indent 2', () => {
		fc.assert(
			fc.property(sourceLike, fc.constantFrom(Language.Python, Language.Yaml), (code, language) => {
				const once = format(code, language, 2)
				return format(once, language, 2) === once
			}),
			{ numRuns: 500 }
		)
	})

	it('keeps the line count of line-based families', () => {
		fc.assert(
			fc.property(sourceLike, fc.constantFrom(...CONTENT_DRIVEN, Language.Python), (code, language) => {
				const lines = (text: string) => text.split(/\r\n|\r|\n/).length
				return lines(format(code, language)) === lines(code)
			}),
			{ numRuns: 500 }
		)
	})

	it('ends with a line break exactly when the input does', () => {
		fc.assert(
			fc.property(sourceLike, fc.constantFrom(...CONTENT_DRIVEN, Language.Python), (code, language) => {
				// A whitespace-only last line is emptied, which exposes the break before it
				fc.pre(!/(?:^|[\r\n])[ \t]+$/.test(code))
				const endsWithBreak = (text: string) => /[\r\n]$/.test(text)
				return endsWithBreak(format(code, language)) === endsWithBreak(code)
			}),
			{ numRuns: 500 }
		)
	})

	it('leaves pass-through languages untouched', () => {
		fc.assert(
			fc.property(fc.string(), fc.constantFrom(Language.Markdown, Language.Toml, Language.None), (code, language) => {
				return format(code, language) === code
			}),
			{ numRuns: 200 }
		)
	})
})
