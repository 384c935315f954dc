import assert from 'node:assert'
import { describe, it } from 'node:test'
import { Language } from '../../src/core/language.ts'
import type { Token } from '../../src/core/tokens.ts'
import type { Tokenizer } from '../../src/lex/tokenizer.ts'
import { defaultRegistry, getTokenizer, TokenizerRegistry } from '../../src/registry/registry.ts'

function stubTokenizer(language: Language): Tokenizer {
	const none: Token[] = []
	return { language, tokenize: () => none, tokenizeRange: () => none }
}

describe('registry', () => {
	it('should build a tokenizer once and reuse it', () => {
		const registry = new TokenizerRegistry()
		const first = registry.resolve(Language.CSharp)
		assert.ok(first !== undefined)
		assert.strictEqual(first.language, Language.CSharp)
		assert.strictEqual(registry.resolve(Language.CSharp), first)
		assert.strictEqual(registry.size, 1)
	})

	it('should return undefined for None', () => {
		const registry = new TokenizerRegistry()
		assert.strictEqual(registry.resolve(Language.None), undefined)
		assert.strictEqual(registry.has(Language.None), false)
	})

	it('should prefer a registered override', () => {
		const registry = new TokenizerRegistry()
		const stub = stubTokenizer(Language.None)
		registry.registerOverride(Language.None, stub)
		assert.strictEqual(registry.resolve(Language.None), stub)

		const rust = stubTokenizer(Language.Rust)
		registry.registerOverride(Language.Rust, rust)
		assert.strictEqual(registry.resolve(Language.Rust), rust)
	})

	it('should rebuild tokenizers after clearAll', () => {
		const registry = new TokenizerRegistry()
		const before = registry.resolve(Language.Go)
		registry.registerOverride(Language.None, stubTokenizer(Language.None))
		registry.clearAll()

		assert.strictEqual(registry.size, 0)
		assert.strictEqual(registry.resolve(Language.None), undefined)
		const after = registry.resolve(Language.Go)
		assert.ok(after !== undefined)
		assert.notStrictEqual(after, before)
	})

	it('should serve the default registry through getTokenizer', () => {
		const tokenizer = getTokenizer(Language.Json)
		assert.ok(tokenizer !== undefined)
		assert.strictEqual([...tokenizer.tokenize('{}')].length, 2)
		assert.strictEqual([...tokenizer.tokenizeRange('{ }', 2, 1)].length, 1)
	})

	it('should hand overrides on the default registry to getTokenizer callers', () => {
		const stub = stubTokenizer(Language.Toml)
		defaultRegistry.registerOverride(Language.Toml, stub)
		try {
			assert.strictEqual(getTokenizer(Language.Toml), stub)
		} finally {
			defaultRegistry.clearAll()
		}
		assert.notStrictEqual(getTokenizer(Language.Toml), stub)
	})
})
