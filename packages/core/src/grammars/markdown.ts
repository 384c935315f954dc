import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { rule } from '../lex/rule.ts'

export const markdownGrammar = lazyGrammar(() =>
	defineGrammar(Language.Markdown, [
		// Fenced code
		rule(/```\w*\n[\s\S]*?```/, TokenType.MarkdownCode, 100),
		rule(/~~~[\s\S]*?~~~/, TokenType.MarkdownCode, 100),
		rule(/`[^`\n]+`/, TokenType.MarkdownCode, 95),
		// ATX and setext headings
		rule(/^#{1,6}\s+[^\n]+/m, TokenType.MarkdownHeading, 90),
		rule(/^[^\n]+\n=+[ \t]*$/m, TokenType.MarkdownHeading, 88),
		rule(/^[^\n]+\n-+[ \t]*$/m, TokenType.MarkdownHeading, 87),
		// Thematic break
		rule(/^(?:[*\-_][ \t]*){3,}$/m, TokenType.Punctuation, 85),
		rule(/^>[^\n]*/m, TokenType.Comment, 80),
		rule(/^[\t ]*[*\-+][ \t]+/m, TokenType.MarkdownList, 75),
		rule(/^[\t ]*\d+\.[ \t]+/m, TokenType.MarkdownList, 75),
		rule(/!\[[^\]]*\]\([^)]+\)/, TokenType.MarkdownLink, 70),
		rule(/\[[^\]]+\]\([^)]+\)/, TokenType.MarkdownLink, 70),
		rule(/\[[^\]]+\]\[[^\]]*\]/, TokenType.MarkdownLink, 70),
		// Link reference definition
		rule(/^\[[^\]]+\]:\s+\S+/m, TokenType.MarkdownLink, 68),
		// Autolink
		rule(/<(?:https?:\/\/[^>]+|[^@>]+@[^>]+)>/, TokenType.MarkdownLink, 65),
		rule(/\*\*[^*\n]+\*\*/, TokenType.MarkdownBold, 60),
		rule(/__[^_\n]+__/, TokenType.MarkdownBold, 60),
		rule(/\*[^*\n]+\*/, TokenType.MarkdownItalic, 55),
		rule(/_[^_\n]+_/, TokenType.MarkdownItalic, 55),
		// Strikethrough
		rule(/~~[^~\n]+~~/, TokenType.Comment, 50),
		// Inline HTML
		rule(
			/<\/?[\w-]+(?:\s+[\w-]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>]+))?)*\s*\/?>/,
			TokenType.XmlTag,
			45
		),
		// Backslash escape
		rule(/\\[\\`*_{}[\]()#+\-.!]/, TokenType.String, 40),
		rule(/\w+/, TokenType.PlainText, 10),
		rule(/[^\w\s]/, TokenType.Punctuation, 5),
		rule(/\s+/, TokenType.PlainText, 0),
	])
)
