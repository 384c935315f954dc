import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const tomlGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Toml,
		[
			rule(/#[^\n]*/, TokenType.Comment, 100),
			// [[array.of.tables]] and [table]
			rule(/\[\[[^\]]+\]\]/, TokenType.TypeName, 95),
			rule(/\[[^\]]+\]/, TokenType.TypeName, 90),
			rule(/'''[\s\S]*?'''/, TokenType.String, 85),
			rule(/"""[\s\S]*?"""/, TokenType.String, 85),
			rule(/'[^'\n]*'/, TokenType.String, 80),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 80),
			// Offset date-time, local date, local time
			rule(
				/\d{4}-\d{2}-\d{2}[T ]\d{2}:\d{2}:\d{2}(?:\.\d+)?(?:Z|[+-]\d{2}:\d{2})?/,
				TokenType.Number,
				75
			),
			rule(/\d{4}-\d{2}-\d{2}/, TokenType.Number, 74),
			rule(/\d{2}:\d{2}:\d{2}(?:\.\d+)?/, TokenType.Number, 73),
			rule(/0x[0-9a-fA-F_]+/, TokenType.Number, 70),
			rule(/0o[0-7_]+/, TokenType.Number, 70),
			rule(/0b[01_]+/, TokenType.Number, 70),
			rule(/[+-]?(?:\d[\d_]*\.[\d_]*|\d[\d_]*[eE][+-]?\d[\d_]*|\.[\d_]+)/, TokenType.Number, 70),
			rule(/[+-]?\d[\d_]*/, TokenType.Number, 65),
			// Bare and dotted keys
			rule(/\b[a-zA-Z_][a-zA-Z0-9_-]*\s*(?==)/, TokenType.Property, 50),
			rule(/[a-zA-Z_][a-zA-Z0-9_-]*(?:\.[a-zA-Z_][a-zA-Z0-9_-]*)+\s*(?==)/, TokenType.Property, 50),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_-]*\b/, TokenType.Identifier, 30),
			rule(/=/, TokenType.Operator, 20),
			rule(/[{}[\],.]/, TokenType.Punctuation, 10),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Toml)
	)
)
