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
	INTEGER,
	MULTI_LINE_COMMENT,
	PUNCTUATION,
	SCIENTIFIC_NOTATION,
	SINGLE_LINE_COMMENT,
	SINGLE_QUOTED_STRING,
	WHITESPACE,
} from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'

export const csharpGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.CSharp,
		[
			rule(/\/\/\/[^\r\n]*/, TokenType.DocComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 9),
			rule(
				/#\s*(?:if|else|elif|endif|define|undef|warning|error|line|region|endregion|pragma|nullable)[^\r\n]*/,
				TokenType.Preprocessor,
				8
			),
			// Verbatim and interpolated strings; "" escapes a quote in verbatim form
			rule(/@"(?:[^"]|"")*"/, TokenType.String, 7),
			rule(/\$"(?:[^"\\]|\\.)*"/, TokenType.String, 7),
			rule(/\$@"(?:[^"]|"")*"/, TokenType.String, 7),
			rule(/@\$"(?:[^"]|"")*"/, TokenType.String, 7),
			rule(DOUBLE_QUOTED_STRING, TokenType.String, 6),
			rule(SINGLE_QUOTED_STRING, TokenType.Character, 6),
			rule(/\[\s*[a-zA-Z_][a-zA-Z0-9_]*(?:\s*\([^)]*\))?\s*\]/, TokenType.Attribute, 5),
			rule(HEX_NUMBER, TokenType.Number, 4),
			rule(BINARY_NUMBER, TokenType.Number, 4),
			rule(FLOATING_POINT, TokenType.Number, 4),
			rule(SCIENTIFIC_NOTATION, TokenType.Number, 4),
			rule(INTEGER, TokenType.Number, 4),
			rule(IDENTIFIER, TokenType.Identifier, 2),
			rule(/=>|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 1),
			rule(PUNCTUATION, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.CSharp)
	)
)
