import assert from 'node:assert'
import { describe, it } from 'node:test'
import { TokenType } from '../../src/core/tokens.ts'
import {
	KeywordTable,
	KeywordTableError,
	loadKeywords,
	parseKeywordFile,
} from '../../src/lex/keywords.ts'

describe('lex/keywords', () => {
	describe('KeywordTable', () => {
		it('should look up words by exact text', () => {
			const table = new KeywordTable({ ControlKeyword: ['if'], TypeName: ['int'] })
			assert.strictEqual(table.lookup('if'), TokenType.ControlKeyword)
			assert.strictEqual(table.lookup('int'), TokenType.TypeName)
			assert.strictEqual(table.lookup('If'), undefined)
			assert.strictEqual(table.size, 2)
		})

		it('should fold case when case-insensitive', () => {
			const table = new KeywordTable({ SqlKeyword: ['SELECT'] }, true)
			assert.strictEqual(table.lookup('select'), TokenType.SqlKeyword)
			assert.strictEqual(table.lookup('SeLeCt'), TokenType.SqlKeyword)
		})

		it('should keep the first type for a word listed twice', () => {
			const table = new KeywordTable({ Constant: ['x'], Keyword: ['x'] })
			assert.strictEqual(table.lookup('x'), TokenType.Constant)
		})
	})

	describe('parseKeywordFile', () => {
		it('should default caseInsensitive to false', () => {
			const table = parseKeywordFile({ keywords: { Keyword: ['fn'] } }, 'sample')
			assert.strictEqual(table.caseInsensitive, false)
			assert.strictEqual(table.lookup('fn'), TokenType.Keyword)
		})

		it('should reject unknown token types', () => {
			assert.throws(
				() => parseKeywordFile({ keywords: { Verb: ['run'] } }, 'sample'),
				(error: unknown) => error instanceof KeywordTableError && error.table === 'sample'
			)
		})

		it('should reject empty words', () => {
			assert.throws(
				() => parseKeywordFile({ keywords: { Keyword: [''] } }, 'sample'),
				KeywordTableError
			)
		})

		it('should reject a missing keywords object', () => {
			assert.throws(() => parseKeywordFile({ caseInsensitive: true }, 'sample'), KeywordTableError)
		})
	})

	describe('loadKeywords', () => {
		it('should load the C# table', () => {
			const table = loadKeywords('csharp')
			assert.strictEqual(table.lookup('class'), TokenType.Keyword)
			assert.strictEqual(table.lookup('return'), TokenType.ControlKeyword)
			assert.strictEqual(table.lookup('int'), TokenType.TypeName)
			assert.strictEqual(table.lookup('null'), TokenType.Constant)
		})

		it('should load the T-SQL table case-insensitively', () => {
			const table = loadKeywords('mssql')
			assert.strictEqual(table.caseInsensitive, true)
			assert.strictEqual(table.lookup('select'), TokenType.SqlKeyword)
			assert.strictEqual(table.lookup('Count'), TokenType.SqlFunction)
		})

		it('should throw KeywordTableError for a missing table', () => {
			assert.throws(() => loadKeywords('no-such-language'), KeywordTableError)
		})
	})
})
