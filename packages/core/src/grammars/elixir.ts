import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const elixirGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Elixir,
		[
			// @doc """...""" outranks the bare module attribute
			rule(/@(?:doc|moduledoc|typedoc)\s+~[sSwWcCdDrRnN]?"""[\s\S]*?"""/, TokenType.DocComment, 101),
			rule(/@(?:doc|moduledoc|typedoc)\s+"""[\s\S]*?"""/, TokenType.DocComment, 101),
			rule(/@[a-z_][a-z0-9_]*/, TokenType.Attribute, 100),
			rule(/#[^\n]*/, TokenType.Comment, 95),
			// Sigils
			rule(/~[sSwWcCdDrRnN]?"""[\s\S]*?"""/, TokenType.String, 92),
			rule(/~[sSwWcCdDrRnN]?'''[\s\S]*?'''/, TokenType.String, 92),
			rule(/~[sSwWcCdDrRnN]?[/|"'[\](){}<>][^/|"'[\](){}<>]*[/|"'[\](){}<>]/, TokenType.String, 90),
			rule(/"""[\s\S]*?"""/, TokenType.String, 88),
			rule(/'''[\s\S]*?'''/, TokenType.String, 88),
			rule(/"(?:[^"\\#]|\\.|#(?!\{)|#\{[^}]*\})*"/, TokenType.String, 85),
			rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 85),
			// Atoms
			rule(/:"[^"]*"/, TokenType.Constant, 82),
			rule(/:[a-zA-Z_][a-zA-Z0-9_]*[?!]?/, TokenType.Constant, 80),
			rule(/0b[01_]+/, TokenType.Number, 75),
			rule(/0o[0-7_]+/, TokenType.Number, 75),
			rule(/0x[0-9a-fA-F_]+/, TokenType.Number, 75),
			rule(/\d[\d_]*\.\d[\d_]*(?:[eE][+-]?\d[\d_]*)?/, TokenType.Number, 70),
			rule(/\d[\d_]*/, TokenType.Number, 65),
			// Module aliases: Foo.Bar
			rule(/\b[A-Z][a-zA-Z0-9_]*(?:\.[A-Z][a-zA-Z0-9_]*)*\b/, TokenType.TypeName, 55),
			rule(/\b[a-z_][a-z0-9_]*[?!]?(?=\()/, TokenType.Method, 52),
			rule(/\b[a-z_][a-z0-9_]*[?!]?\b/, TokenType.Identifier, 50),
			rule(
				/<>|<-|->|=>|\|>|<\||<<<|>>>|~~~|\+\+|--|\.\.\.?|::|[+\-*/%=<>!&|^~@]+/,
				TokenType.Operator,
				40
			),
			rule(/[(){}[\];,.]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Elixir)
	)
)
