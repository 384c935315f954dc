import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { rule } from '../lex/rule.ts'

export const jsonGrammar = lazyGrammar(() =>
	defineGrammar(Language.Json, [
		// A string followed by a colon is a member name
		rule(/"(?:[^"\\]|\\.)*"(?=\s*:)/, TokenType.JsonKey, 101),
		rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 100),
		rule(/-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/, TokenType.Number, 80),
		rule(/\b(?:true|false|null)\b/, TokenType.Keyword, 70),
		rule(/[{}[\]:,]/, TokenType.Punctuation, 60),
		rule(/\s+/, TokenType.PlainText, 0),
	])
)
