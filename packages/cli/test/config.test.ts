import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Language } from '@tintline/core'
import { ConfigError, loadConfig } from '../src/config.ts'

describe('loadConfig', () => {
	it('should use defaults for an empty environment', () => {
		assert.deepStrictEqual(loadConfig({}), { indentSize: 4, language: undefined, useTabs: false })
	})

	it('should read every variable', () => {
		const config = loadConfig({
			TINTLINE_INDENT_SIZE: '2',
			TINTLINE_LANGUAGE: 'Python',
			TINTLINE_USE_TABS: 'Yes',
		})
		assert.deepStrictEqual(config, { indentSize: 2, language: Language.Python, useTabs: true })
	})

	it('should treat empty variables as unset', () => {
		assert.deepStrictEqual(loadConfig({ TINTLINE_INDENT_SIZE: '', TINTLINE_USE_TABS: ' ' }), {
			indentSize: 4,
			language: undefined,
			useTabs: false,
		})
	})

	it('should ignore unrelated variables', () => {
		assert.strictEqual(loadConfig({ HOME: '/home/test', PATH: '/bin' }).indentSize, 4)
	})

	it('should reject an out-of-range indent size', () => {
		assert.throws(
			() => loadConfig({ TINTLINE_INDENT_SIZE: '0' }),
			(error: unknown) => error instanceof ConfigError && error.message.includes('TINTLINE_INDENT_SIZE')
		)
	})

	it('should reject a non-boolean tab setting', () => {
		assert.throws(() => loadConfig({ TINTLINE_USE_TABS: 'maybe' }), ConfigError)
	})

	it('should reject an unknown default language', () => {
		assert.throws(
			() => loadConfig({ TINTLINE_LANGUAGE: 'klingon' }),
			(error: unknown) => error instanceof ConfigError && error.message.includes('unknown language "klingon"')
		)
	})
})
