import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { WHITESPACE } from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'

export const visualBasicGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.VisualBasic,
		[
			rule(/'''[^\r\n]*/, TokenType.DocComment, 11),
			rule(/'[^\r\n]*/, TokenType.Comment, 10),
			rule(/REM\s[^\r\n]*/i, TokenType.Comment, 10),
			rule(
				/#\s*(?:If|Else|ElseIf|End\s+If|Const|Region|End\s+Region|ExternalSource|End\s+ExternalSource|ExternalChecksum|Enable|Disable)[^\r\n]*/i,
				TokenType.Preprocessor,
				9
			),
			rule(/"(?:[^"]|"")*"/, TokenType.String, 8),
			// Date literal: #1/1/2024#
			rule(/#[^#]+#/, TokenType.Number, 7),
			rule(/&H[0-9a-fA-F]+[ILSU%&@!#]*/, TokenType.Number, 6),
			rule(/&O[0-7]+[ILSU%&@!#]*/, TokenType.Number, 6),
			rule(/&B[01]+[ILSU%&@!#]*/, TokenType.Number, 6),
			rule(/\b\d+\.\d+(?:[eE][+-]?\d+)?[FRDS!#@]*\b/, TokenType.Number, 5),
			rule(/\b\d+[eE][+-]?\d+[FRDS!#@]*\b/, TokenType.Number, 5),
			rule(/\b\d+[ILSU%&@!#FRDS]*\b/, TokenType.Number, 4),
			// Line continuation; outranks a lone _ read as an identifier
			rule(/_[ \t]*$/m, TokenType.Punctuation, 3),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 2),
			rule(/[+\-*/\\^=<>&]+/, TokenType.Operator, 1),
			rule(/[(){}[\];,.]/, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.VisualBasic)
	)
)
