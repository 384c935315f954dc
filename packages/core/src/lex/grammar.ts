import type { Language } from '../core/language.ts'
import type { KeywordTable } from './keywords.ts'
import type { PatternRule } from './rule.ts'

/**
 * A language's lexical definition.
 * Frozen once built; one instance per language is shared by every tokenizer.
 */
export interface Grammar {
	readonly language: Language
	readonly rules: readonly PatternRule[]
	readonly keywords?: KeywordTable
}

export function defineGrammar(
	language: Language,
	rules: readonly PatternRule[],
	keywords?: KeywordTable
): Grammar {
	const frozenRules = Object.freeze([...rules])
	return keywords === undefined
		? Object.freeze({ language, rules: frozenRules })
		: Object.freeze({ keywords, language, rules: frozenRules })
}

/**
 * Builds a grammar on first call and returns the same instance afterwards.
 */
export function lazyGrammar(build: () => Grammar): () => Grammar {
	let grammar: Grammar | undefined
	return () => {
		grammar ??= build()
		return grammar
	}
}
