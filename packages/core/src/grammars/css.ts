import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { rule } from '../lex/rule.ts'

export const cssGrammar = lazyGrammar(() =>
	defineGrammar(Language.Css, [
		rule(/\/\*[\s\S]*?\*\//, TokenType.Comment, 100),
		rule(/\/\/[^\n]*/, TokenType.Comment, 95),
		// At-rules
		rule(/@[\w-]+/, TokenType.Keyword, 90),
		rule(/#[\w-]+/, TokenType.CssSelector, 85),
		rule(/\.[\w-]+/, TokenType.CssSelector, 85),
		// Pseudo-classes and pseudo-elements
		rule(/::?[\w-]+(?:\([^)]*\))?/, TokenType.CssSelector, 80),
		rule(/\[[^\]]+\]/, TokenType.CssSelector, 80),
		rule(/url\s*\([^)]*\)/, TokenType.String, 75),
		rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 70),
		rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 70),
		// Hex colors outrank id selectors
		rule(/#(?:[0-9a-fA-F]{8}|[0-9a-fA-F]{6}|[0-9a-fA-F]{4}|[0-9a-fA-F]{3})\b/, TokenType.Number, 86),
		rule(
			/-?(?:\d+\.?\d*|\.\d+)(?:px|em|rem|%|vh|vw|vmin|vmax|ch|ex|cm|mm|in|pt|pc|deg|rad|grad|turn|s|ms|Hz|kHz|dpi|dpcm|dppx)\b/,
			TokenType.CssUnit,
			60
		),
		rule(/-?(?:\d+\.?\d*|\.\d+)/, TokenType.Number, 55),
		rule(/[\w-]+\s*\(/, TokenType.Method, 50),
		rule(/!important\b/i, TokenType.Keyword, 45),
		rule(/[\w-]+(?=\s*:)/, TokenType.CssProperty, 40),
		// Custom property reference
		rule(/--[\w-]+/, TokenType.Field, 35),
		rule(/[\w-]+/, TokenType.CssValue, 30),
		rule(/[{}();:,>+~*\\/=]/, TokenType.Punctuation, 20),
		rule(/\s+/, TokenType.PlainText, 0),
	])
)
