import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const rubyGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Ruby,
		[
			rule(/#[^\n]*/, TokenType.Comment, 100),
			rule(/=begin[\s\S]*?=end/, TokenType.MultiLineComment, 100),
			// Heredoc: <<~EOS ... EOS
			rule(/<<[-~]?['`"]?(\w+)['`"]?.*?\n[\s\S]*?\n\s*\1/, TokenType.String, 98),
			rule(/(?<![\w)\]]\s*)\/(?![/*])(?:[^/\\\r\n]|\\.)+\/[imxo]*/, TokenType.Regex, 95),
			rule(/%r\{(?:[^}\\]|\\.)*\}[imxo]*/, TokenType.Regex, 95),
			rule(/%r\[(?:[^\]\\]|\\.)*\][imxo]*/, TokenType.Regex, 95),
			rule(/%r\((?:[^)\\]|\\.)*\)[imxo]*/, TokenType.Regex, 95),
			rule(/"(?:[^"\\]|\\.|#\{[^}]*\})*"/, TokenType.String, 90),
			rule(/'(?:[^'\\]|\\.)*'/, TokenType.String, 90),
			// Percent literals: %w[], %i(), %q{} ...
			rule(/%[qQwWiIxs]?\{(?:[^}\\]|\\.)*\}/, TokenType.String, 90),
			rule(/%[qQwWiIxs]?\[(?:[^\]\\]|\\.)*\]/, TokenType.String, 90),
			rule(/%[qQwWiIxs]?\((?:[^)\\]|\\.)*\)/, TokenType.String, 90),
			rule(/%[qQwWiIxs]?<(?:[^>\\]|\\.)*>/, TokenType.String, 90),
			// Symbols
			rule(/:\w+[!?]?/, TokenType.Constant, 85),
			rule(/:"[^"]*"/, TokenType.Constant, 85),
			// Instance and class variables
			rule(/@{1,2}\w+/, TokenType.Field, 80),
			// Globals
			rule(/\$\w+/, TokenType.ShellVariable, 80),
			rule(/\$[!@&`'+~=/\\,;.<>*$?:"]/, TokenType.ShellVariable, 80),
			rule(/\b[A-Z][A-Z0-9_]+\b/, TokenType.Constant, 75),
			rule(/\b[A-Z]\w*\b/, TokenType.TypeName, 70),
			rule(/0[xX][0-9a-fA-F_]+/, TokenType.Number, 65),
			rule(/0[bB][01_]+/, TokenType.Number, 65),
			rule(/0[oO]?[0-7_]+/, TokenType.Number, 65),
			rule(/\d[\d_]*\.[\d_]+(?:[eE][+-]?[\d_]+)?/, TokenType.Number, 60),
			rule(/\d[\d_]*[eE][+-]?[\d_]+/, TokenType.Number, 60),
			rule(/\d[\d_]*/, TokenType.Number, 55),
			rule(/(?<=def\s+)\w+[!?=]?/, TokenType.Method, 50),
			rule(/\b\w+[!?]?(?=\s*[(.])/, TokenType.Method, 45),
			rule(/<=>|<<?|>>?|&&|\|\||[+\-*/%&|^~]=?|[<>=!]=|===?|!~|=~|\*\*=?|\.\.\.?/, TokenType.Operator, 40),
			rule(/\b[a-z_]\w*[!?]?\b/, TokenType.Identifier, 30),
			rule(/[{}()[\];,.:?]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Ruby)
	)
)
