import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const luaGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Lua,
		[
			rule(/--\[\[[\s\S]*?\]\]/, TokenType.MultiLineComment, 100),
			rule(/--[^\n]*/, TokenType.Comment, 95),
			// Long bracket string
			rule(/\[\[[\s\S]*?\]\]/, TokenType.String, 90),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 85),
			rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 85),
			rule(/\b0[xX][0-9a-fA-F]+\b/, TokenType.Number, 70),
			rule(/\b\d+\.?\d*(?:[eE][+-]?\d+)?\b/, TokenType.Number, 70),
			// goto label
			rule(/::[a-zA-Z_][a-zA-Z0-9_]*::/, TokenType.Attribute, 60),
			rule(/\.\.\.?|[+\-*/%^#=<>~]=?|~=/, TokenType.Operator, 40),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 30),
			rule(/[{}()[\];,.:]+/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Lua)
	)
)
