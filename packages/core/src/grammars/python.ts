import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { HASH_COMMENT, WHITESPACE } from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'

export const pythonGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Python,
		[
			// Triple-quoted, with up to two prefix letters (rb, Rf, ...)
			rule(/[rRbBuUfF]{0,2}"""[\s\S]*?"""/, TokenType.String, 10),
			rule(/[rRbBuUfF]{0,2}'''[\s\S]*?'''/, TokenType.String, 10),
			rule(HASH_COMMENT, TokenType.Comment, 9),
			rule(/@[a-zA-Z_][a-zA-Z0-9_.]*/, TokenType.Attribute, 8),
			rule(/[fF]"(?:[^"\\]|\\.)*"/, TokenType.String, 7),
			rule(/[fF]'(?:[^'\\]|\\.)*'/, TokenType.String, 7),
			rule(/[rRbBuU]?"(?:[^"\\]|\\.)*"/, TokenType.String, 6),
			rule(/[rRbBuU]?'(?:[^'\\]|\\.)*'/, TokenType.String, 6),
			rule(/\b0[xX][0-9a-fA-F_]+\b/, TokenType.Number, 5),
			rule(/\b0[oO][0-7_]+\b/, TokenType.Number, 5),
			rule(/\b0[bB][01_]+\b/, TokenType.Number, 5),
			rule(/\b\d[\d_]*\.\d[\d_]*(?:[eE][+-]?\d[\d_]*)?j?\b/, TokenType.Number, 4),
			rule(/\b\d[\d_]*[eE][+-]?\d[\d_]*j?\b/, TokenType.Number, 4),
			rule(/\b\d[\d_]*j?\b/, TokenType.Number, 4),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 2),
			rule(/->|:=|\*\*|\/\/|[+\-*/%=<>!&|^~@:]+/, TokenType.Operator, 1),
			rule(/[(){}[\];,.]/, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.Python)
	)
)
