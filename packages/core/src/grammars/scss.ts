import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const scssGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Scss,
		[
			rule(/\/\*[\s\S]*?\*\//, TokenType.MultiLineComment, 100),
			rule(/\/\/[^\n]*/, TokenType.Comment, 95),
			// Interpolation: #{$var}
			rule(/#\{[^}]*\}/, TokenType.Identifier, 90),
			// $variables and @mixin names
			rule(/[$@][a-zA-Z_][a-zA-Z0-9_-]*/, TokenType.Identifier, 85),
			rule(/@[a-zA-Z_][a-zA-Z0-9_-]*/, TokenType.Keyword, 82),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 80),
			rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 80),
			rule(/url\([^)]*\)/, TokenType.String, 78),
			rule(/#[0-9a-fA-F]{3,8}\b/, TokenType.Number, 75),
			rule(
				/-?\d+\.?\d*(?:px|em|rem|%|vh|vw|vmin|vmax|ch|ex|cm|mm|in|pt|pc|deg|rad|grad|turn|s|ms|Hz|kHz|dpi|dpcm|dppx|fr)?/,
				TokenType.Number,
				70
			),
			rule(/\.[a-zA-Z_][a-zA-Z0-9_-]*/, TokenType.TypeName, 60),
			rule(/#[a-zA-Z_][a-zA-Z0-9_-]*/, TokenType.TypeName, 58),
			rule(/::?[a-zA-Z_][a-zA-Z0-9_-]*(?:\([^)]*\))?/, TokenType.Keyword, 55),
			rule(/\[[^\]]+\]/, TokenType.Attribute, 52),
			rule(/[a-zA-Z_-][a-zA-Z0-9_-]*\s*(?=:)/, TokenType.Property, 50),
			rule(
				/\b(?:html|body|div|span|p|a|img|ul|ol|li|table|tr|td|th|form|input|button|header|footer|nav|section|article|aside|main|h[1-6])\b/,
				TokenType.TypeName,
				45
			),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_-]*\b/, TokenType.Identifier, 40),
			rule(/[+\-*/%=<>!&|~^]+|:/, TokenType.Operator, 30),
			rule(/[(){}[\];,.]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Scss)
	)
)
