import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const graphqlGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.GraphQL,
		[
			rule(/#[^\n]*/, TokenType.Comment, 100),
			// Block string
			rule(/"""[\s\S]*?"""/, TokenType.String, 90),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 85),
			// Directives
			rule(/@[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Attribute, 80),
			// Variables
			rule(/\$[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Identifier, 75),
			// Spread
			rule(/\.\.\./, TokenType.Operator, 70),
			rule(/-?\d+\.\d+(?:[eE][+-]?\d+)?/, TokenType.Number, 65),
			rule(/-?\d+/, TokenType.Number, 60),
			rule(/\b[A-Z][a-zA-Z0-9_]*\b/, TokenType.TypeName, 50),
			rule(/\b[a-z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 40),
			rule(/[=!:|&]/, TokenType.Operator, 30),
			rule(/[(){}[\],]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.GraphQL)
	)
)
