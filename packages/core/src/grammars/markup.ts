import type { Language } from '../core/language.ts'
import { TokenType } from '../core/tokens.ts'
import { defineGrammar, type Grammar } from '../lex/grammar.ts'
import { rule } from '../lex/rule.ts'

/**
 * Inside of a single tag, `<name attr="value">`.
 * HTML and XML embed it for every tag their own rules match.
 */
export function createTagGrammar(language: Language): Grammar {
	return defineGrammar(language, [
		rule(/<\/?/, TokenType.Punctuation, 100),
		rule(/(?<=<\/?\s*)[\w:-]+/, TokenType.XmlTag, 90),
		rule(/"[^"]*"|'[^']*'/, TokenType.XmlAttributeValue, 85),
		// Unquoted HTML value
		rule(/(?<==\s*)[^\s"'>]+/, TokenType.XmlAttributeValue, 85),
		rule(/[\w:.-]+/, TokenType.XmlAttribute, 80),
		rule(/[=/>]/, TokenType.Punctuation, 70),
		rule(/\s+/, TokenType.PlainText, 0),
	])
}
