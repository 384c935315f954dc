/**
 * Lexical analysis module.
 * Grammars are prioritized regex rules; the engine turns text into a lazy token stream.
 */

export { tokenize, tokenizeRange } from './engine.ts'
export { defineGrammar, type Grammar, lazyGrammar } from './grammar.ts'
export {
	type KeywordFile,
	type KeywordGroups,
	KeywordTable,
	KeywordTableError,
	loadKeywords,
	parseKeywordFile,
} from './keywords.ts'
export { type PatternRule, type RuleOptions, rule, stickyPattern } from './rule.ts'
export { GrammarTokenizer, type Tokenizer } from './tokenizer.ts'
