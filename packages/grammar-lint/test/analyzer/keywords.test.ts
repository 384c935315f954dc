import * as assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { defineGrammar, KeywordTable, Language, rule, TokenType } from '@tintline/core'
import { analyzeKeywords } from '../../src/analyzer/keywords.ts'

describe('analyzeKeywords', () => {
	it('should return nothing without a keyword table', () => {
		const grammar = defineGrammar(Language.CSharp, [rule(/[a-z]+/, TokenType.Identifier, 1)])

		assert.deepEqual(analyzeKeywords(grammar), [])
	})

	it('should warn when no identifier rule exists', () => {
		const grammar = defineGrammar(
			Language.CSharp,
			[rule(/\d+/, TokenType.Number, 1)],
			new KeywordTable({ Keyword: ['if'] })
		)

		const issues = analyzeKeywords(grammar)
		assert.equal(issues.length, 1)
		assert.equal(issues[0]?.code, 'TLGRAM021')
		assert.equal(issues[0]?.severity, 'warning')
		assert.equal(issues[0]?.message, 'keyword table has no identifier rule to act on')
	})

	it('should report unreachable and shadowed keywords', () => {
		const grammar = defineGrammar(
			Language.CSharp,
			[rule(/[a-z]+/, TokenType.Identifier, 2), rule(/do/, TokenType.Operator, 5)],
			new KeywordTable({ Keyword: ['if', 'do', 'x-y'] })
		)

		const issues = analyzeKeywords(grammar)
		assert.deepEqual(
			issues.map((issue) => [issue.code, issue.severity, issue.rule, issue.message]),
			[
				['TLGRAM022', 'info', 'do', 'keyword "do" is tokenized as Operator instead of Keyword'],
				['TLGRAM020', 'warning', 'x-y', 'keyword "x-y" cannot be produced by any identifier rule'],
			]
		)
	})

	it('should join the types of a keyword that splits into several tokens', () => {
		const grammar = defineGrammar(
			Language.CSharp,
			[rule(/[a-z]+/, TokenType.Identifier, 2), rule(/f/, TokenType.Operator, 5)],
			new KeywordTable({ Keyword: ['fi'] })
		)

		const issues = analyzeKeywords(grammar)
		assert.equal(issues[0]?.message, 'keyword "fi" is tokenized as Operator+Identifier instead of Keyword')
	})

	it('should compare case-insensitive tables through their folded words', () => {
		const grammar = defineGrammar(
			Language.MsSql,
			[rule(/[A-Za-z]+/, TokenType.Identifier, 2)],
			new KeywordTable({ SqlKeyword: ['SELECT'] }, true)
		)

		assert.deepEqual(analyzeKeywords(grammar), [])
	})
})
