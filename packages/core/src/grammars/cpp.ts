import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
	IDENTIFIER,
	MULTI_LINE_COMMENT,
	PUNCTUATION,
	SINGLE_LINE_COMMENT,
	WHITESPACE,
} from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'
import { C_PREPROCESSOR } from './c.ts'

export const cppGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Cpp,
		[
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			rule(C_PREPROCESSOR, TokenType.Preprocessor, 8),
			rule(/<[a-zA-Z0-9_./]+(?:\.h|\.hpp)?>/, TokenType.String, 7),
			// Raw string: R"delim( ... )delim"
			rule(/R"[a-zA-Z0-9_]*\([\s\S]*?\)[a-zA-Z0-9_]*"/, TokenType.String, 7),
			rule(/(?:u8|u|U|L)?"(?:[^"\\]|\\.)*"/, TokenType.String, 6),
			rule(/(?:u8|u|U|L)?'(?:[^'\\]|\\.)*'/, TokenType.Character, 6),
			// ' is a digit separator
			rule(/\b0[xX][0-9a-fA-F']+[uUlLzZ]*\b/, TokenType.Number, 5),
			rule(/\b0[bB][01']+[uUlLzZ]*\b/, TokenType.Number, 5),
			rule(/\b0[0-7']+[uUlLzZ]*\b/, TokenType.Number, 5),
			rule(/\b\d[\d']*\.\d[\d']*(?:[eE][+-]?\d[\d']*)?[fFlL]?\b/, TokenType.Number, 4),
			rule(/\b\d[\d']*[eE][+-]?\d[\d']*[fFlL]?\b/, TokenType.Number, 4),
			rule(/\b\d[\d']*[uUlLzZ]*\b/, TokenType.Number, 4),
			rule(IDENTIFIER, TokenType.Identifier, 2),
			rule(/->|\.\*|::|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 1),
			rule(PUNCTUATION, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.Cpp)
	)
)
