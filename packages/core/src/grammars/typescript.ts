import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
	DOUBLE_QUOTED_STRING,
	MULTI_LINE_COMMENT,
	SINGLE_LINE_COMMENT,
	SINGLE_QUOTED_STRING,
	WHITESPACE,
} from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'
import {
	ECMASCRIPT_IDENTIFIER,
	ECMASCRIPT_NUMBERS,
	REGEX_LITERAL,
	TEMPLATE_LITERAL,
} from './javascript.ts'

export const typescriptGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.TypeScript,
		[
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			// Decorators
			rule(/@[a-zA-Z_$][a-zA-Z0-9_$]*/, TokenType.Attribute, 8),
			rule(REGEX_LITERAL, TokenType.Regex, 7),
			rule(TEMPLATE_LITERAL, TokenType.String, 6),
			rule(DOUBLE_QUOTED_STRING, TokenType.String, 6),
			rule(SINGLE_QUOTED_STRING, TokenType.String, 6),
			...ECMASCRIPT_NUMBERS,
			rule(ECMASCRIPT_IDENTIFIER, TokenType.Identifier, 2),
			rule(/=>|\.{3}|\?\?=|\?\?|\?\.|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 1),
			rule(/[(){}[\];,.<>]/, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.TypeScript)
	)
)
