import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const rGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.R,
		[
			rule(/#[^\n]*/, TokenType.Comment, 100),
			rule(/[rR]"[^"]*"/, TokenType.String, 90),
			rule(/[rR]'[^']*'/, TokenType.String, 90),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 85),
			rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 85),
			// Backquoted name
			rule(/`[^`]+`/, TokenType.Identifier, 80),
			rule(/\b\d+\.?\d*[eE][+-]?\d+i?\b/, TokenType.Number, 70),
			rule(/\b0[xX][0-9a-fA-F]+L?\b/, TokenType.Number, 70),
			rule(/\b\d+\.?\d*L?\b/, TokenType.Number, 70),
			rule(
				/<-|<<-|->|->>|%%|%\/%|%\*%|%in%|%o%|%x%|\|\||&&|::|:::|\$|@|[+\-*/%^<>=!&|:~?]+/,
				TokenType.Operator,
				40
			),
			rule(/\b[a-zA-Z][a-zA-Z0-9._]*\b/, TokenType.Identifier, 30),
			rule(/\.[a-zA-Z][a-zA-Z0-9._]*\b/, TokenType.Identifier, 30),
			rule(/[{}()[\];,]+/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.R)
	)
)
