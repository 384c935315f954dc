import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
	DOUBLE_QUOTED_STRING,
	FLOATING_POINT,
	HASH_COMMENT,
	HEX_NUMBER,
	MULTI_LINE_COMMENT,
	SINGLE_LINE_COMMENT,
	WHITESPACE,
} from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'

export const phpGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Php,
		[
			rule(/<\?php|\?>|<\?=/, TokenType.Preprocessor, 11),
			rule(/\/\*\*[\s\S]*?\*\//, TokenType.DocComment, 10),
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			rule(HASH_COMMENT, TokenType.Comment, 9),
			// PHP 8 attributes outrank the hash comment
			rule(/#\[[^\]]+\]/, TokenType.Attribute, 10),
			// Heredoc and nowdoc; the closing label sits alone on its line
			rule(/<<<['"]?([a-zA-Z_][a-zA-Z0-9_]*)['"]?[\s\S]*?^\s*\1;?$/m, TokenType.String, 7),
			rule(DOUBLE_QUOTED_STRING, TokenType.String, 6),
			rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 6),
			rule(/\$[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Identifier, 5),
			rule(HEX_NUMBER, TokenType.Number, 4),
			rule(/\b0[bB][01_]+\b/, TokenType.Number, 4),
			rule(/\b0[oO][0-7_]+\b/, TokenType.Number, 4),
			rule(FLOATING_POINT, TokenType.Number, 4),
			rule(/\b\d[\d_]*\b/, TokenType.Number, 4),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 2),
			rule(/=>|->|\?\?|<=>|\.\.\.|[+\-*/%=<>!&|^~?:.]+/, TokenType.Operator, 1),
			rule(/[(){}[\];,@]/, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.Php)
	)
)
