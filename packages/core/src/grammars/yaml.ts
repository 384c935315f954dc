import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { rule } from '../lex/rule.ts'

export const yamlGrammar = lazyGrammar(() =>
	defineGrammar(Language.Yaml, [
		rule(/#[^\n]*/, TokenType.Comment, 100),
		// Document markers
		rule(/^---[ \t]*$/m, TokenType.Punctuation, 95),
		rule(/^\.\.\.[ \t]*$/m, TokenType.Punctuation, 95),
		rule(/&[\w-]+/, TokenType.YamlAnchor, 90),
		rule(/\*[\w-]+/, TokenType.YamlAlias, 90),
		rule(/!![^\s]+|![^\s!][^\s]*/, TokenType.YamlTag, 85),
		// Block scalar indicators
		rule(/[|>][+-]?/, TokenType.Operator, 80),
		rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 75),
		rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 75),
		rule(/\w[\w \t-]*(?=[ \t]*:)/, TokenType.JsonKey, 70),
		rule(/\b(?:true|false|yes|no|on|off|null)\b/i, TokenType.Keyword, 65),
		rule(
			/-?(?:0x[\da-fA-F]+|0o[0-7]+|0b[01]+|(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?)/,
			TokenType.Number,
			60
		),
		rule(/\.(?:inf|Inf|INF|nan|NaN|NAN)/, TokenType.Number, 60),
		rule(/\d{4}-\d{2}-\d{2}(?:[ T]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})?)?/, TokenType.Number, 61),
		rule(/[{}[\]:,\-?]/, TokenType.Punctuation, 50),
		// Plain scalar
		rule(/[^\s#:{}[\],&*!|>'"]+/, TokenType.String, 40),
		rule(/\s+/, TokenType.PlainText, 0),
	])
)
