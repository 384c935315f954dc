import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const kotlinGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Kotlin,
		[
			rule(/\/\/[^\n]*/, TokenType.Comment, 100),
			rule(/\/\*[\s\S]*?\*\//, TokenType.MultiLineComment, 100),
			rule(/"""[\s\S]*?"""/, TokenType.String, 95),
			rule(/"[^"]*"/, TokenType.String, 90),
			rule(/'[^']*'/, TokenType.Character, 90),
			rule(/@\w+/, TokenType.Attribute, 85),
			rule(/\b\d+\.?\d*\b/, TokenType.Number, 70),
			rule(/\b[A-Z]\w*\b/, TokenType.TypeName, 50),
			rule(/[+\-*/%=<>!&|]+/, TokenType.Operator, 40),
			rule(/\b[a-z_]\w*\b/, TokenType.Identifier, 30),
			rule(/[{}()[\];,.:?]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Kotlin)
	)
)
