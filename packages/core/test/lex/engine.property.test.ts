import { describe, it } from 'node:test'
import fc from 'fast-check'
import { SUPPORTED_LANGUAGES } from '../../src/core/language.ts'
import { type Token, tokenEnd } from '../../src/core/tokens.ts'
import { grammarFor } from '../../src/grammars/index.ts'
import { tokenize, tokenizeRange } from '../../src/lex/engine.ts'

function isPartition(tokens: readonly Token[], text: string): boolean {
	let position = 0
	for (const token of tokens) {
		if (token.start !== position || token.length <= 0) return false
		position = tokenEnd(token)
	}
	return position === text.length
}

const codeLike = fc
	.array(
		fc.constantFrom(
			'"',
			"'",
			'`',
			'/*',
			'*/',
			'//',
			'#',
			'<',
			'>',
			'</',
			'{',
			'}',
			'0x1F',
			'3.14',
			'@',
			'$',
			'\\',
			'\n',
			' ',
			'if',
			'x',
			'<script>',
			'</script>'
		),
		{ maxLength: 40 }
	)
	.map((parts) => parts.join(''))

const text = fc.oneof(fc.string({ maxLength: 60 }), codeLike)
const language = fc.constantFrom(...SUPPORTED_LANGUAGES)

describe('lex/engine properties', () => {
	it('partitions any input for every grammar', () => {
		fc.assert(
			fc.property(text, language, (input, lang) => {
				return isPartition([...tokenize(input, grammarFor(lang))], input)
			}),
			{ numRuns: 1000 }
		)
	})

	it('is deterministic', () => {
		fc.assert(
			fc.property(text, language, (input, lang) => {
				const grammar = grammarFor(lang)
				const first = JSON.stringify([...tokenize(input, grammar)])
				return first === JSON.stringify([...tokenize(input, grammar)])
			}),
			{ numRuns: 300 }
		)
	})

	it('tokenizeRange equals filtering a full tokenization', () => {
		fc.assert(
			fc.property(
				text,
				language,
				fc.nat({ max: 70 }),
				fc.nat({ max: 70 }),
				(input, lang, start, length) => {
					const grammar = grammarFor(lang)
					const expected = [...tokenize(input, grammar)].filter(
						(token) => tokenEnd(token) > start && token.start < start + length
					)
					const actual = [...tokenizeRange(input, grammar, start, length)]
					return JSON.stringify(actual) === JSON.stringify(expected)
				}
			),
			{ numRuns: 300 }
		)
	})
})
