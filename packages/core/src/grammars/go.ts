import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const goGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Go,
		[
			rule(/\/\/[^\n]*/, TokenType.Comment, 100),
			rule(/\/\*[\s\S]*?\*\//, TokenType.MultiLineComment, 100),
			// Raw string
			rule(/`[^`]*`/, TokenType.String, 95),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 90),
			rule(/'(?:[^'\\]|\\.)'/, TokenType.Character, 90),
			// Imaginary literal
			rule(/\d+(?:\.\d+)?i/, TokenType.Number, 85),
			rule(/0[xX][0-9a-fA-F_]+/, TokenType.Number, 80),
			rule(/0[oO][0-7_]+/, TokenType.Number, 80),
			rule(/0[bB][01_]+/, TokenType.Number, 80),
			rule(/\d+\.\d+(?:[eE][+-]?\d+)?/, TokenType.Number, 75),
			rule(/\d+[eE][+-]?\d+/, TokenType.Number, 75),
			rule(/\d[0-9_]*/, TokenType.Number, 70),
			// Package qualifier: fmt.Println
			rule(/\b[a-z][a-zA-Z0-9_]*(?=\.)/, TokenType.Namespace, 65),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*(?=\s*\()/, TokenType.Method, 60),
			rule(/\b[A-Z][a-zA-Z0-9_]*\b/, TokenType.TypeName, 55),
			rule(/:=|<-|\.\.\.|\+\+|--|&&|\|\||<<|>>|&\^|[+\-*/%&|^<>=!]=?/, TokenType.Operator, 50),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 40),
			rule(/[{}()[\];,.:&*]/, TokenType.Punctuation, 30),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Go)
	)
)
