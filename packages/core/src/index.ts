/**
 * Public API.
 *
 * - Token model and language identifiers
 * - Priority-driven regex lexer with per-language grammars
 * - Tokenizer registry keyed by language
 * - Structural reformatter
 */

export {
	detectLanguage,
	isLanguage,
	isSupportedLanguage,
	Language,
	parseLanguage,
	SUPPORTED_LANGUAGES,
	type SupportedLanguage,
} from './core/language.ts'
export {
	createToken,
	formatToken,
	isTokenType,
	shiftToken,
	type Token,
	TokenType,
	tokenEnd,
	tokenText,
} from './core/tokens.ts'
export {
	countBraces,
	FormatterFamily,
	format,
	formatterFamily,
	type IndentOptions,
	leadingWidth,
	SqlDialect,
} from './format/index.ts'
export { grammarFor } from './grammars/index.ts'
export {
	defineGrammar,
	type Grammar,
	GrammarTokenizer,
	type KeywordFile,
	type KeywordGroups,
	KeywordTable,
	KeywordTableError,
	lazyGrammar,
	loadKeywords,
	type PatternRule,
	parseKeywordFile,
	type RuleOptions,
	rule,
	stickyPattern,
	type Tokenizer,
	tokenize,
	tokenizeRange,
} from './lex/index.ts'
export { defaultRegistry, getTokenizer, TokenizerRegistry } from './registry/registry.ts'
