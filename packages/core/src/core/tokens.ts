/**
 * Token model.
 * A token is a classified span of source text; it holds offsets only, never the text.
 */

/** Semantic categories consumed by highlighters. */
export const TokenType = {
	Attribute: 'Attribute',
	Character: 'Character',
	Comment: 'Comment',
	Constant: 'Constant',
	ControlKeyword: 'ControlKeyword',
	CssProperty: 'CssProperty',
	CssSelector: 'CssSelector',
	CssUnit: 'CssUnit',
	CssValue: 'CssValue',
	DocComment: 'DocComment',
	Error: 'Error',
	Field: 'Field',
	Identifier: 'Identifier',
	JsonKey: 'JsonKey',
	Keyword: 'Keyword',
	MarkdownBold: 'MarkdownBold',
	MarkdownCode: 'MarkdownCode',
	MarkdownHeading: 'MarkdownHeading',
	MarkdownItalic: 'MarkdownItalic',
	MarkdownLink: 'MarkdownLink',
	MarkdownList: 'MarkdownList',
	Method: 'Method',
	MultiLineComment: 'MultiLineComment',
	Namespace: 'Namespace',
	Number: 'Number',
	Operator: 'Operator',
	Parameter: 'Parameter',
	PlainText: 'PlainText',
	PowerShellCmdlet: 'PowerShellCmdlet',
	PowerShellParameter: 'PowerShellParameter',
	Preprocessor: 'Preprocessor',
	Property: 'Property',
	Punctuation: 'Punctuation',
	Regex: 'Regex',
	ShellCommand: 'ShellCommand',
	ShellOption: 'ShellOption',
	ShellVariable: 'ShellVariable',
	SqlFunction: 'SqlFunction',
	SqlKeyword: 'SqlKeyword',
	String: 'String',
	TypeDeclaration: 'TypeDeclaration',
	TypeName: 'TypeName',
	Warning: 'Warning',
	XmlAttribute: 'XmlAttribute',
	XmlAttributeValue: 'XmlAttributeValue',
	XmlTag: 'XmlTag',
	YamlAlias: 'YamlAlias',
	YamlAnchor: 'YamlAnchor',
	YamlTag: 'YamlTag',
} as const

export type TokenType = (typeof TokenType)[keyof typeof TokenType]

const TOKEN_TYPES: ReadonlySet<string> = new Set(Object.values(TokenType))

export function isTokenType(value: string): value is TokenType {
	return TOKEN_TYPES.has(value)
}

/**
 * A lexical span.
 * - start: offset of the first character
 * - length: always positive for engine output
 */
export interface Token {
	readonly start: number
	readonly length: number
	readonly type: TokenType
}

export function createToken(start: number, length: number, type: TokenType): Token {
	return Object.freeze({ length, start, type })
}

/** Offset one past the last character. */
export function tokenEnd(token: Token): number {
	return token.start + token.length
}

/**
 * The source text a token covers.
 * Returns '' when the span does not fit inside source.
 */
export function tokenText(token: Token, source: string): string {
	if (token.start < 0 || token.length < 0 || tokenEnd(token) > source.length) return ''
	return source.slice(token.start, tokenEnd(token))
}

/** Returns a copy moved right by offset. */
export function shiftToken(token: Token, offset: number): Token {
	return createToken(token.start + offset, token.length, token.type)
}

export function formatToken(token: Token): string {
	return `Token(${token.type}, ${token.start}..${tokenEnd(token)})`
}
