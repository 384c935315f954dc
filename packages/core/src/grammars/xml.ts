import { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, lazyGrammar } from '../lex/grammar.ts'
import { rule } from '../lex/rule.ts'
import { createTagGrammar } from './markup.ts'

export const xmlGrammar = lazyGrammar(() => {
	const tag = createTagGrammar(Language.Xml)
	return defineGrammar(Language.Xml, [
		rule(/<\?xml[^?]*\?>/, TokenType.Preprocessor, 100),
		// Processing instruction
		rule(/<\?[\w-]+[^?]*\?>/, TokenType.Preprocessor, 95),
		rule(/<!\[CDATA\[[\s\S]*?\]\]>/, TokenType.String, 90),
		rule(/<!--[\s\S]*?-->/, TokenType.Comment, 85),
		rule(/<!DOCTYPE[^>]*>/, TokenType.Preprocessor, 80),
		rule(/<[\w:-]+(?:\s+[\w:-]+\s*=\s*(?:"[^"]*"|'[^']*'))*\s*\/?>/, TokenType.XmlTag, 75, {
			embed: tag,
		}),
		rule(/<\/[\w:-]+\s*>/, TokenType.XmlTag, 70, { embed: tag }),
		rule(/&[\w#]+;/, TokenType.Constant, 60),
		rule(/[^<>&]+/, TokenType.PlainText, 10),
		rule(/[<>&]/, TokenType.Punctuation, 5),
	])
})
