import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
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

/** Directive lines shared with C++ and Objective-C. */
export const C_PREPROCESSOR =
	/#\s*(?:include|define|undef|if|ifdef|ifndef|else|elif|endif|error|pragma|line|warning)[^\r\n]*/

export const cGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.C,
		[
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			rule(C_PREPROCESSOR, TokenType.Preprocessor, 8),
			// System include path
			rule(/<[a-zA-Z0-9_./]+\.h>/, TokenType.String, 7),
			rule(DOUBLE_QUOTED_STRING, TokenType.String, 6),
			rule(SINGLE_QUOTED_STRING, TokenType.Character, 6),
			rule(HEX_NUMBER, TokenType.Number, 5),
			rule(/\b0[0-7]+[uUlL]*\b/, TokenType.Number, 5),
			rule(FLOATING_POINT, TokenType.Number, 4),
			rule(SCIENTIFIC_NOTATION, TokenType.Number, 4),
			rule(INTEGER, TokenType.Number, 4),
			rule(IDENTIFIER, TokenType.Identifier, 2),
			rule(/->|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 1),
			rule(PUNCTUATION, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.C)
	)
)
