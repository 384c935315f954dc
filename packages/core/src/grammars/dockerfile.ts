import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { loadKeywords } from '../lex/keywords.ts'
import { rule } from '../lex/rule.ts'

export const dockerfileGrammar = lazyGrammar(() =>
	defineGrammar(
		Language.Dockerfile,
		[
			rule(/#[^\n]*/, TokenType.Comment, 100),
			// Parser directives outrank ordinary comments
			rule(/^#\s*(?:syntax|escape)\s*=\s*[^\n]+/m, TokenType.Preprocessor, 101),
			// Instruction at the start of a line
			rule(
				/^[ \t]*(?:FROM|RUN|CMD|LABEL|MAINTAINER|EXPOSE|ENV|ADD|COPY|ENTRYPOINT|VOLUME|USER|WORKDIR|ARG|ONBUILD|STOPSIGNAL|HEALTHCHECK|SHELL)\b/im,
				TokenType.Keyword,
				95
			),
			rule(/\bAS\b/i, TokenType.Keyword, 90),
			rule(/--from=\w+/, TokenType.Attribute, 86),
			rule(/--\w+(?:=\S+)?/, TokenType.ShellOption, 85),
			rule(/\$\{[^}]+\}/, TokenType.ShellVariable, 80),
			rule(/\$\w+/, TokenType.ShellVariable, 80),
			rule(/"(?:[^"\\]|\\.)*"/, TokenType.String, 75),
			rule(/'[^']*'/, TokenType.String, 75),
			// Image tag and digest
			rule(/:\d+(?:\.\d+)*(?:-[\w.-]+)?/, TokenType.Number, 70),
			rule(/@sha256:[a-f0-9]+/, TokenType.Number, 70),
			// Port, optionally with protocol
			rule(/\b\d{1,5}(?:\/(?:tcp|udp))?\b/, TokenType.Number, 65),
			// Exec form: ["cmd", "arg"]
			rule(/\[[^\]]*\]/, TokenType.String, 60),
			rule(/https?:\/\/\S+/, TokenType.String, 55),
			rule(/\/[\w./-]+/, TokenType.Identifier, 50),
			rule(/\b\w+=/, TokenType.JsonKey, 45),
			// Line continuation
			rule(/\\$/m, TokenType.Operator, 40),
			rule(/&&|\|\||[|;]/, TokenType.Operator, 35),
			rule(/\b[a-zA-Z_][\w.-]*\b/, TokenType.Identifier, 30),
			rule(/\b\d+\b/, TokenType.Number, 25),
			rule(/[{}[\](),:]/, TokenType.Punctuation, 20),
			rule(/\s+/, TokenType.PlainText, 0),
		],
		loadKeywords(Language.Dockerfile)
	)
)
