import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const dartGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Dart,
		[
			rule(/\/\/\/[^\n]*/, TokenType.DocComment, 100),
			rule(/\/\*[\s\S]*?\*\//, TokenType.MultiLineComment, 95),
			rule(/\/\/[^\n]*/, TokenType.Comment, 90),
			rule(/r"[^"]*"/, TokenType.String, 85),
			rule(/r'[^']*'/, TokenType.String, 85),
			rule(/"""[\s\S]*?"""/, TokenType.String, 85),
			rule(/'''[\s\S]*?'''/, TokenType.String, 85),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 80),
			rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 80),
			rule(/@[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Attribute, 75),
			rule(/\b0[xX][0-9a-fA-F]+\b/, TokenType.Number, 70),
			rule(/\b\d+\.?\d*(?:[eE][+-]?\d+)?\b/, TokenType.Number, 70),
			rule(/\b[A-Z][a-zA-Z0-9_]*\b/, TokenType.TypeName, 50),
			rule(/=>|->|\?\?|\.\.\.?|\?\.|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 40),
			rule(/\b[a-z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 30),
			rule(/[{}()[\];,.<>]+/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Dart)
	)
)
