import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const objectiveCGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.ObjectiveC,
		[
			rule(
				/#\s*(?:import|include|define|undef|ifdef|ifndef|if|else|elif|endif|pragma|error|warning|line)[^\n]*/,
				TokenType.Preprocessor,
				100
			),
			rule(/\/\*[\s\S]*?\*\//, TokenType.MultiLineComment, 95),
			rule(/\/\/[^\n]*/, TokenType.Comment, 90),
			rule(/@"(?:[^"\\]|\\.)*"/, TokenType.String, 88),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 85),
			rule(/'(?:[^'\\]|\\.)'/, TokenType.Character, 85),
			// @interface, @end, @property ...
			rule(/@[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.Keyword, 82),
			// Boxed expressions and collection literals
			rule(/@\(/, TokenType.Operator, 80),
			rule(/@[[{]/, TokenType.Operator, 80),
			rule(/0[xX][0-9a-fA-F]+[uUlL]*/, TokenType.Number, 75),
			rule(/\d+\.\d*(?:[eE][+-]?\d+)?[fFlL]?/, TokenType.Number, 75),
			rule(/\.\d+(?:[eE][+-]?\d+)?[fFlL]?/, TokenType.Number, 75),
			rule(/\d+[uUlL]*/, TokenType.Number, 70),
			// Framework-prefixed class names
			rule(
				/\b(?:NS|CG|CF|UI|CA|CI|CL|MK|AV|SK|SC|WK|GC)[A-Z][a-zA-Z0-9]*\b/,
				TokenType.TypeName,
				55
			),
			// Protocol conformance list
			rule(/<[^>]+>/, TokenType.TypeName, 50),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 40),
			rule(/->|[+\-*/%=<>!&|^~?:]+/, TokenType.Operator, 30),
			rule(/[(){}[\];,.]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.ObjectiveC)
	)
)
