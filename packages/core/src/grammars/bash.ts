import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const bashGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Bash,
		[
			rule(/^#!.*$/m, TokenType.Preprocessor, 100),
			rule(/#[^\n]*/, TokenType.Comment, 95),
			// Heredoc, closed by its label at the start of a line
			rule(/<<-?\s*['"]?(\w+)['"]?[\s\S]*?\n\s*\1\b/, TokenType.String, 90),
			rule(/"(?:[^"\\$]|\\.|\$(?:\{[^}]+\}|\([^)]+\)|[\w@#?$!*-])|\$)*"/, TokenType.String, 85),
			rule(/'[^']*'/, TokenType.String, 85),
			// ANSI-C quoting
			rule(/\$'(?:[^'\\]|\\.)*'/, TokenType.String, 85),
			// Command substitution and arithmetic expansion
			rule(/\$\([^)]+\)/, TokenType.Method, 80),
			rule(/\$\(\([^)]+\)\)/, TokenType.Number, 80),
			rule(/`[^`]+`/, TokenType.Method, 80),
			rule(/\$\{[^}]+\}/, TokenType.ShellVariable, 75),
			rule(/\$[@*#?$!0-9-]/, TokenType.ShellVariable, 75),
			rule(/\$[a-zA-Z_][a-zA-Z0-9_]*/, TokenType.ShellVariable, 75),
			rule(/--[a-zA-Z][a-zA-Z0-9-]*/, TokenType.ShellOption, 70),
			rule(/(?<=\s)-[a-zA-Z]+/, TokenType.ShellOption, 70),
			rule(/\b\d+\b/, TokenType.Number, 60),
			// Function definition: name()
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\s*\(\s*\)/, TokenType.Method, 55),
			rule(/\[\[|\]\]|\[|\]/, TokenType.Keyword, 50),
			rule(/>>|>&|<&|<<|<>|[<>]/, TokenType.Operator, 45),
			rule(/\|\||&&|\|&?|&/, TokenType.Operator, 45),
			// Test operators
			rule(/-(?:eq|ne|lt|le|gt|ge|z|n|e|f|d|r|w|x|s|L|O|G|N|nt|ot|ef)\b/, TokenType.Operator, 45),
			rule(/[+\-*/%]=?|==?|!=/, TokenType.Operator, 40),
			rule(/\b[a-zA-Z_][a-zA-Z0-9_]*\b/, TokenType.Identifier, 30),
			rule(/[{}();,]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Bash)
	)
)
