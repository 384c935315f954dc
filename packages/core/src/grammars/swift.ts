import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const swiftGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Swift,
		[
			rule(/\/\/\/[^\n]*/, TokenType.DocComment, 101),
			rule(/\/\/[^\n]*/, TokenType.Comment, 100),
			rule(/\/\*[\s\S]*?\*\//, TokenType.MultiLineComment, 100),
			rule(/"""[\s\S]*?"""/, TokenType.String, 95),
			// Interpolation: \(expr)
			rule(/"(?:[^"\\]|\\\([^)]*\)|\\.)*"/, TokenType.String, 90),
			rule(/@\w+/, TokenType.Attribute, 85),
			rule(
				/#(?:if|elseif|else|endif|sourceLocation|warning|error|available|selector|keyPath|colorLiteral|fileLiteral|imageLiteral)\b[^\n]*/,
				TokenType.Preprocessor,
				85
			),
			rule(/0x[0-9a-fA-F_]+(?:\.[0-9a-fA-F_]+)?(?:[pP][+-]?[0-9_]+)?/, TokenType.Number, 80),
			rule(/0b[01_]+/, TokenType.Number, 80),
			rule(/0o[0-7_]+/, TokenType.Number, 80),
			rule(/\d[\d_]*\.[\d_]+(?:[eE][+-]?[\d_]+)?/, TokenType.Number, 75),
			rule(/\d[\d_]*[eE][+-]?[\d_]+/, TokenType.Number, 75),
			rule(/\d[\d_]*/, TokenType.Number, 70),
			// Generic parameter clause
			rule(/<\s*\w+(?:\s*:\s*\w+)?(?:\s*,\s*\w+(?:\s*:\s*\w+)?)*\s*>/, TokenType.TypeName, 65),
			rule(/\b[A-Z]\w*\b/, TokenType.TypeName, 60),
			rule(/\b[a-z_]\w*(?=\s*[(<])/, TokenType.Method, 55),
			rule(/\?\?|\?\.|\?/, TokenType.Operator, 50),
			rule(/\.\.\.|\.\.<|->|[+\-*/%]=?|&&|\|\||[&|^~]=?|<<?=?|>>?=?|===?|!==?|!/, TokenType.Operator, 45),
			rule(/\b[a-z_]\w*\b/, TokenType.Identifier, 30),
			// Escaped identifier
			rule(/`\w+`/, TokenType.Identifier, 30),
			rule(/[{}()[\];,.:@#]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Swift)
	)
)
