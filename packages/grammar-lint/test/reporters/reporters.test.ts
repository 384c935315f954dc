import * as assert from 'node:assert/strict'
import { describe, it } from 'node:test'
import { Language } from '@tintline/core'
import { reportResults } from '../../src/lint.ts'
import { JsonReporter } from '../../src/reporters/json.ts'
import { SpecReporter } from '../../src/reporters/spec.ts'
import type { LintResult } from '../../src/types.ts'

const clean: LintResult = {
	issues: [],
	language: Language.CSharp,
	stats: { keywordCount: 2, ruleCount: 3, zeroLengthRules: [] },
}

const broken: LintResult = {
	issues: [
		{
			aiHint: undefined,
			code: 'TLGRAM001',
			message: 'rule #0 /x*/ can match the empty string',
			rule: '#0',
			severity: 'error',
		},
	],
	language: Language.Go,
	stats: { keywordCount: 0, ruleCount: 1, zeroLengthRules: [0] },
}

describe('SpecReporter', () => {
	it('should print a check line for a clean grammar', () => {
		const output = reportResults([clean], new SpecReporter())
		assert.equal(output, '\n  csharp\n    ✓ 3 rules, 2 keywords\n\n  1 passing')
	})

	it('should print a cross line per error and count the grammar as failing', () => {
		const output = reportResults([broken], new SpecReporter())
		assert.equal(
			output,
			'\n  go\n    ✗ [error] TLGRAM001 rule #0 /x*/ can match the empty string\n\n  0 passing\n  1 failing'
		)
	})
})

describe('JsonReporter', () => {
	it('should emit one entry per grammar with a hint per issue', () => {
		const parsed: unknown = JSON.parse(reportResults([clean, broken], new JsonReporter()))

		assert.deepEqual(parsed, {
			grammars: [
				{
					issues: [],
					keywordCount: 2,
					language: 'csharp',
					passed: true,
					ruleCount: 3,
					zeroLengthRules: [],
				},
				{
					issues: [
						{
							aiHint: 'Inspect #0 in the grammar definition: rule #0 /x*/ can match the empty string',
							code: 'TLGRAM001',
							message: 'rule #0 /x*/ can match the empty string',
							rule: '#0',
							severity: 'error',
						},
					],
					keywordCount: 0,
					language: 'go',
					passed: false,
					ruleCount: 1,
					zeroLengthRules: [0],
				},
			],
		})
	})
})
