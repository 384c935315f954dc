import type { Language } from '../core/language.ts'
import type { Token } from '../core/tokens.ts'
import { tokenize, tokenizeRange } from './engine.ts'
import type { Grammar } from './grammar.ts'

/**
 * What the registry hands out.
 * Custom implementations can be registered as overrides.
 */
export interface Tokenizer {
	readonly language: Language
	tokenize(text: string): Iterable<Token>
	tokenizeRange(text: string, start: number, length: number): Iterable<Token>
}

/** Tokenizer backed by a grammar and the regex engine. */
export class GrammarTokenizer implements Tokenizer {
	readonly grammar: Grammar

	constructor(grammar: Grammar) {
		this.grammar = grammar
	}

	get language(): Language {
		return this.grammar.language
	}

	tokenize(text: string): Generator<Token, void, undefined> {
		return tokenize(text, this.grammar)
	}

	tokenizeRange(text: string, start: number, length: number): Generator<Token, void, undefined> {
		return tokenizeRange(text, this.grammar, start, length)
	}
}
