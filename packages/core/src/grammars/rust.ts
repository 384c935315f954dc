import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import {
	DOUBLE_QUOTED_STRING,
	IDENTIFIER,
	MULTI_LINE_COMMENT,
	SINGLE_LINE_COMMENT,
	SINGLE_QUOTED_STRING,
	WHITESPACE,
} from '../lex/patterns.ts'
import { rule } from '../lex/rule.ts'

export const rustGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Rust,
		[
			rule(/\/\/\/[^\r\n]*/, TokenType.DocComment, 11),
			rule(/\/\/![^\r\n]*/, TokenType.DocComment, 11),
			rule(MULTI_LINE_COMMENT, TokenType.MultiLineComment, 10),
			rule(SINGLE_LINE_COMMENT, TokenType.Comment, 9),
			rule(/#!\??\[[^\]]*\]/, TokenType.Attribute, 8),
			rule(/#\[[^\]]*\]/, TokenType.Attribute, 8),
			rule(/r#*"[^"]*"#*/, TokenType.String, 7),
			rule(/b"(?:[^"\\]|\\.)*"/, TokenType.String, 6),
			rule(/b'(?:[^'\\]|\\.)*'/, TokenType.Character, 6),
			rule(DOUBLE_QUOTED_STRING, TokenType.String, 6),
			rule(SINGLE_QUOTED_STRING, TokenType.Character, 6),
			// Lifetimes
			rule(/'[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Parameter, 5),
			rule(
				/\b0[xX][0-9a-fA-F_]+(?:i8|i16|i32|i64|i128|isize|u8|u16|u32|u64|u128|usize)?\b/,
				TokenType.Number,
				4
			),
			rule(
				/\b0[oO][0-7_]+(?:i8|i16|i32|i64|i128|isize|u8|u16|u32|u64|u128|usize)?\b/,
				TokenType.Number,
				4
			),
			rule(
				/\b0[bB][01_]+(?:i8|i16|i32|i64|i128|isize|u8|u16|u32|u64|u128|usize)?\b/,
				TokenType.Number,
				4
			),
			rule(/\b\d[\d_]*\.\d[\d_]*(?:[eE][+-]?\d[\d_]*)?(?:f32|f64)?\b/, TokenType.Number, 4),
			rule(/\b\d[\d_]*[eE][+-]?\d[\d_]*(?:f32|f64)?\b/, TokenType.Number, 4),
			rule(
				/\b\d[\d_]*(?:i8|i16|i32|i64|i128|isize|u8|u16|u32|u64|u128|usize|f32|f64)?\b/,
				TokenType.Number,
				4
			),
			// Macro invocations: println!, vec!
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*!/, TokenType.Method, 3),
			rule(IDENTIFIER, TokenType.Identifier, 2),
			rule(/=>|->|\.\.=?|\?\.|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 1),
			rule(/[(){}[\];,.]/, TokenType.Punctuation, 0),
			rule(WHITESPACE, TokenType.PlainText, -1),
		],
		loadKeywords(Language.Rust)
	)
)
