/**
 * Tokenizer registry.
 * Lookup-or-create runs synchronously, so each language is constructed at most once
 * per registry until cleared.
 */

import { isSupportedLanguage, type Language } from '../core/language.ts'
import { grammarFor } from '../grammars/index.ts'
import { GrammarTokenizer, type Tokenizer } from '../lex/tokenizer.ts'

export class TokenizerRegistry {
	private readonly tokenizers = new Map<Language, Tokenizer>()

	/**
	 * Tokenizer for a language, built on first request.
	 * Returns undefined for None.
	 */
	resolve(language: Language): Tokenizer | undefined {
		const cached = this.tokenizers.get(language)
		if (cached !== undefined) return cached
		if (!isSupportedLanguage(language)) return undefined

		const tokenizer = new GrammarTokenizer(grammarFor(language))
		this.tokenizers.set(language, tokenizer)
		return tokenizer
	}

	/** Replaces whatever resolve would return for language, None included. */
	registerOverride(language: Language, tokenizer: Tokenizer): void {
		this.tokenizers.set(language, tokenizer)
	}

	/** Drops every cached tokenizer and every override. */
	clearAll(): void {
		this.tokenizers.clear()
	}

	has(language: Language): boolean {
		return this.tokenizers.has(language)
	}

	get size(): number {
		return this.tokenizers.size
	}
}

export const defaultRegistry = new TokenizerRegistry()

export function getTokenizer(language: Language): Tokenizer | undefined {
	return defaultRegistry.resolve(language)
}
