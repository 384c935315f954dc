import * as assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { defineGrammar, Language, rule, TokenType } from '@tintline/core'
import { analyzeZeroLength, findZeroLengthRules } from '../../src/analyzer/zero-length.ts'

describe('findZeroLengthRules', () => {
	it('should detect star and lookahead-only patterns', () => {
		const grammar = defineGrammar(Language.CSharp, [
			rule(/a+/, TokenType.Identifier, 1),
			rule(/x*/, TokenType.String, 2),
			rule(/(?=a)/, TokenType.Operator, 0),
		])

		assert.deepEqual(findZeroLengthRules(grammar), [1, 2])
	})

	it('should not flag lookbehind rules that consume characters', () => {
		const grammar = defineGrammar(Language.Html, [rule(/(?<=<)\w+/, TokenType.XmlTag, 1)])

		assert.deepEqual(findZeroLengthRules(grammar), [])
	})
})

describe('analyzeZeroLength', () => {
	it('should report an error per empty-matching rule', () => {
		const grammar = defineGrammar(Language.CSharp, [rule(/\d+/, TokenType.Number, 1), rule(/x?/, TokenType.String, 2)])

		const issues = analyzeZeroLength(grammar)
		assert.equal(issues.length, 1)
		assert.equal(issues[0]?.code, 'TLGRAM001')
		assert.equal(issues[0]?.severity, 'error')
		assert.equal(issues[0]?.rule, '#1')
		assert.equal(issues[0]?.message, 'rule #1 /x?/ can match the empty string')
	})
})
