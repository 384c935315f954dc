import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
	BINARY_NUMBER,
	DOUBLE_QUOTED_STRING,
	FLOATING_POINT,
	HEX_NUMBER,
	IDENTIFIER,
	MULTI_LINE_COMMENT,
	PUNCTUATION,
	SINGLE_LINE_COMMENT,
	SINGLE_QUOTED_STRING,
	WHITESPACE,
} from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'

export const javaGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Java,
		[
			rule(/\/\*\*[\s\S]*?\*\//, TokenType.DocComment, 11),
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			// Annotations, possibly qualified
			rule(/@[a-zA-Z_][a-zA-Z0-9_]*(?:\.[a-zA-Z_][a-zA-Z0-9_]*)*/, TokenType.Attribute, 8),
			// Text block
			rule(/"""[\s\S]*?"""/, TokenType.String, 7),
			rule(DOUBLE_QUOTED_STRING, TokenType.String, 6),
			rule(SINGLE_QUOTED_STRING, TokenType.Character, 6),
			rule(HEX_NUMBER, TokenType.Number, 5),
			rule(BINARY_NUMBER, TokenType.Number, 5),
			rule(/\b\d+_*\d*[lLfFdD]?\b/, TokenType.Number, 4),
			rule(FLOATING_POINT, TokenType.Number, 4),
			rule(IDENTIFIER, TokenType.Identifier, 2),
			rule(/->|::|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 1),
			rule(PUNCTUATION, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.Java)
	)
)
