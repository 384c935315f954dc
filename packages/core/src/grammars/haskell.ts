import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const haskellGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Haskell,
		[
			// {-# LANGUAGE ... #-}
			rule(/\{-#[\s\S]*?#-\}/, TokenType.Preprocessor, 100),
			rule(/\{-[\s\S]*?-\}/, TokenType.MultiLineComment, 95),
			rule(/--[^\n]*/, TokenType.Comment, 90),
			rule(/'(?:[^'\\]|\\.|\\x[0-9a-fA-F]+)'/, TokenType.Character, 85),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 80),
			rule(/0[xX][0-9a-fA-F]+/, TokenType.Number, 70),
			rule(/0[oO][0-7]+/, TokenType.Number, 70),
			rule(/0[bB][01]+/, TokenType.Number, 70),
			rule(/\d+\.\d+(?:[eE][+-]?\d+)?/, TokenType.Number, 70),
			rule(/\d+/, TokenType.Number, 65),
			rule(/\b[A-Z][a-zA-Z0-9_']*\b/, TokenType.TypeName, 50),
			rule(/->|<-|=>|::|\\|@|~|=|[+\-*/<>!?&|^$#%:.]+/, TokenType.Operator, 40),
			rule(/\b[a-z_][a-zA-Z0-9_']*\b/, TokenType.Identifier, 30),
			rule(/[(){}[\];,`]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Haskell)
	)
)
