import * as assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { defineGrammar, KeywordTable, Language, rule, SUPPORTED_LANGUAGES, TokenType } from '@tintline/core'
import { hasErrors, lintGrammar, lintLanguages } from '../src/lint.ts'

describe('lintGrammar', () => {
	it('should collect issues from every analyzer with stats', () => {
		const grammar = defineGrammar(
			Language.CSharp,
			[
				rule(/[a-z]+/, TokenType.Identifier, 2),
				rule(/\s*/, TokenType.PlainText, 0),
				rule(/[a-z]+/, TokenType.Field, 1),
			],
			new KeywordTable({ Keyword: ['if', 'else'] })
		)

		const result = lintGrammar(grammar)
		assert.equal(result.language, Language.CSharp)
		assert.deepEqual(result.stats, { keywordCount: 2, ruleCount: 3, zeroLengthRules: [1] })
		assert.deepEqual(
			result.issues.map((issue) => issue.code),
			['TLGRAM001', 'TLGRAM002']
		)
		assert.equal(hasErrors([result]), true)
	})

	it('should pass a clean grammar', () => {
		const grammar = defineGrammar(Language.Go, [rule(/\w+/, TokenType.Identifier, 1)])

		const result = lintGrammar(grammar)
		assert.deepEqual(result.issues, [])
		assert.equal(hasErrors([result]), false)
	})
})

describe('lintLanguages', () => {
	it('should lint every built-in grammar by default', () => {
		const results = lintLanguages()
		assert.deepEqual(
			results.map((result) => result.language),
			[...SUPPORTED_LANGUAGES]
		)
	})

	it('should find no error-level issues in the built-in grammars', () => {
		const errors = lintLanguages().flatMap((result) =>
			result.issues.filter((issue) => issue.severity === 'error').map((issue) => `${result.language}: ${issue.message}`)
		)
		assert.deepEqual(errors, [])
	})

	it('should lint only the requested languages', () => {
		const results = lintLanguages([Language.Json, Language.Python])
		assert.deepEqual(
			results.map((result) => result.language),
			[Language.Json, Language.Python]
		)
		assert.ok(results.every((result) => result.stats.ruleCount > 0))
	})
})
