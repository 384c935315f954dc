import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const scalaGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Scala,
		[
			rule(/\/\/[^\n]*/, TokenType.Comment, 100),
			rule(/\/\*[\s\S]*?\*\//, TokenType.MultiLineComment, 100),
			rule(/\/\*\*[\s\S]*?\*\//, TokenType.DocComment, 101),
			rule(/"""[\s\S]*?"""/, TokenType.String, 95),
			// s"..." and f"..." interpolators
			rule(/[sf]"(?:[^"\\]|\\.|\$\{[^}]*\}|\$\w+)*"/, TokenType.String, 92),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 90),
			rule(/'(?:[^'\\]|\\.)'/, TokenType.Character, 90),
			// Symbol literal
			rule(/'\w+/, TokenType.Constant, 85),
			rule(/@\w+(?:\.\w+)*/, TokenType.Attribute, 85),
			rule(/0[xX][0-9a-fA-F_]+[Ll]?/, TokenType.Number, 80),
			rule(/\d[\d_]*\.[\d_]+(?:[eE][+-]?[\d_]+)?[fFdD]?/, TokenType.Number, 75),
			rule(/\d[\d_]*[eE][+-]?[\d_]+[fFdD]?/, TokenType.Number, 75),
			rule(/\d[\d_]*[fFdD]/, TokenType.Number, 75),
			rule(/\d[\d_]*[Ll]?/, TokenType.Number, 70),
			// Type argument list: [A, B]
			rule(/\[\s*[A-Z]\w*(?:\s*,\s*[A-Z]\w*)*\s*\]/, TokenType.TypeName, 65),
			rule(/\b[A-Z]\w*\b/, TokenType.TypeName, 60),
			rule(/\b[a-z_]\w*(?=\s*[[(])/, TokenType.Method, 55),
			rule(/=>|<-|::|[+\-*/%]=?|&&|\|\||[&|^~]=?|<<?=?|>>?>?=?|===?|!=|!/, TokenType.Operator, 45),
			// Placeholder
			rule(/\b_\b/, TokenType.Keyword, 40),
			rule(/\b[a-z_]\w*\b/, TokenType.Identifier, 30),
			rule(/`[^`]+`/, TokenType.Identifier, 30),
			rule(/[{}()[\];,.:@#]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Scala)
	)
)
