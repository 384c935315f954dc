/**
 * SQL dialects.
 * Both share one rule set; Oracle adds substitution variables and its own keyword table.
 */

import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
	FLOATING_POINT,
	IDENTIFIER,
	INTEGER,
	MULTI_LINE_COMMENT,
	WHITESPACE,
} from '../lex/patterns.ts'
import { type PatternRule, rule } from '../lex/rule.ts'

const SQL_RULES: readonly PatternRule[] = [
	rule(/--[^\r\n]*/, TokenType.Comment, 10),
	rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
	// '' escapes a quote
	rule(/'(?:[^']|'')*'/, TokenType.String, 8),
	rule(/"(?:[^"]|"")*"/, TokenType.String, 8),
	// [bracketed identifier]
	rule(/\[[^\]]+\]/, TokenType.Identifier, 7),
	rule(FLOATING_POINT, TokenType.Number, 5),
	rule(INTEGER, TokenType.Number, 4),
	rule(/@[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Parameter, 6),
	rule(/:[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Parameter, 6),
	rule(IDENTIFIER, TokenType.Identifier, 2),
	rule(/[+\-*/%=<>!|]+/, TokenType.Operator, 1),
	rule(/[(){}[\];,.]/, TokenType.Punctuation, 0),
	rule(WHITESPACE, TokenType.PlainText, -1),
]

export const msSqlGrammar = lazyGrammar(() =>
	defineGrammar(Language.MsSql, SQL_RULES, loadKeywords(Language.MsSql))
)

export const oracleSqlGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.OracleSql,
		[
			// &substitution variable
			rule(/&[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Parameter, 6),
			...SQL_RULES,
		],
		loadKeywords(Language.OracleSql)
	)
)
