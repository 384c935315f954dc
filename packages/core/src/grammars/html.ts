import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { rule } from '../lex/rule.ts'
import { cssGrammar } from './css.ts'
import { javascriptGrammar } from './javascript.ts'
import { createTagGrammar } from './markup.ts'

const ATTRIBUTES = String.raw`(?:\s+[\w:-]+(?:\s*=\s*(?:"[^"]*"|'[^']*'|[^\s>]+))?)*`

export const htmlGrammar = lazyGrammar(() => {
	const tag = createTagGrammar(Language.Html)
	return defineGrammar(Language.Html, [
		rule(/<!--[\s\S]*?-->/, TokenType.Comment, 100),
		rule(/<!DOCTYPE[^>]*>/i, TokenType.Preprocessor, 95),
		// Element bodies handed to the script and style grammars
		rule(/(?<=<script\b[^>]*>)(?!<\/script>)[\s\S]+?(?=<\/script>)/i, TokenType.PlainText, 90, {
			embed: javascriptGrammar(),
		}),
		rule(/(?<=<style\b[^>]*>)(?!<\/style>)[\s\S]+?(?=<\/style>)/i, TokenType.PlainText, 90, {
			embed: cssGrammar(),
		}),
		rule(new RegExp(String.raw`<\s*[\w:-]+${ATTRIBUTES}\s*\/?\s*>`), TokenType.XmlTag, 85, {
			embed: tag,
		}),
		rule(/<\/\s*[\w:-]+\s*>/, TokenType.XmlTag, 80, { embed: tag }),
		rule(/"[^"]*"/, TokenType.XmlAttributeValue, 70),
		rule(/'[^']*'/, TokenType.XmlAttributeValue, 70),
		// Character references
		rule(/&(?:#\d+|#x[\da-fA-F]+|[a-zA-Z]+);/, TokenType.Constant, 60),
		rule(/[<>=/]/, TokenType.Punctuation, 10),
		rule(/[^<>&"'=/\s]+/, TokenType.PlainText, 5),
		rule(/\s+/, TokenType.PlainText, 0),
	])
})
