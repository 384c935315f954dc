import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
	DOUBLE_QUOTED_STRING,
	FLOATING_POINT,
	INTEGER,
	MULTI_LINE_COMMENT,
	SINGLE_LINE_COMMENT,
	SINGLE_QUOTED_STRING,
	WHITESPACE,
} from '../lex/patterns.ts'
import { type PatternRule, rule } from '../lex/rule.ts'

/**
 * Regex literal. A slash right after an identifier, number or closing
 * bracket is division, so those positions are excluded.
 */
export const REGEX_LITERAL = /(?<![\w$)\]]\s*)\/(?![/*])(?:[^/\\\r\n]|\\.)+\/[dgimsuy]*/

/** Template literal with `${...}` holes that contain no braces. */
export const TEMPLATE_LITERAL = /`(?:[^`\\$]|\\.|\$(?!\{)|\$\{[^}]*\})*`/

/** Number forms shared by JavaScript and TypeScript, BigInt suffix included. */
export const ECMASCRIPT_NUMBERS: readonly PatternRule[] = [
	rule(/\b0[xX][0-9a-fA-F]+n?\b/, TokenType.Number, 5),
	rule(/\b0[oO][0-7]+n?\b/, TokenType.Number, 5),
	rule(/\b0[bB][01]+n?\b/, TokenType.Number, 5),
	rule(/\b\d+n\b/, TokenType.Number, 5),
	rule(FLOATING_POINT, TokenType.Number, 4),
	rule(INTEGER, TokenType.Number, 4),
]

export const ECMASCRIPT_IDENTIFIER = /\b[a-zA-Z_$][a-zA-Z0-9_$]*\b/

export const javascriptGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.JavaScript,
		[
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			rule(REGEX_LITERAL, TokenType.Regex, 8),
			rule(TEMPLATE_LITERAL, TokenType.String, 7),
			rule(DOUBLE_QUOTED_STRING, TokenType.String, 6),
			rule(SINGLE_QUOTED_STRING, TokenType.String, 6),
			...ECMASCRIPT_NUMBERS,
			rule(ECMASCRIPT_IDENTIFIER, TokenType.Identifier, 2),
			rule(/=>|\.{3}|\?\?|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 1),
			rule(/[(){}[\];,.]/, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.JavaScript)
	)
)
