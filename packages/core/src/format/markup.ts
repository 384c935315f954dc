/**
 * Tag-based formatters for HTML and XML.
 * A line's opening tags indent the following lines unless the same line closes them.
 */

import { type IndentOptions, type LinePlanner, reindent } from './lines.ts'

const VOID_ELEMENTS = new Set([
	'area',
	'base',
	'br',
	'col',
	'embed',
	'hr',
	'img',
	'input',
	'link',
	'meta',
	'param',
	'source',
	'track',
	'wbr',
])

const INLINE_ELEMENTS = new Set([
	'a',
	'abbr',
	'b',
	'bdo',
	'br',
	'button',
	'cite',
	'code',
	'dfn',
	'em',
	'i',
	'img',
	'input',
	'kbd',
	'label',
	'q',
	'samp',
	'select',
	'small',
	'span',
	'strong',
	'sub',
	'sup',
	'textarea',
	'var',
])

interface TagDialect {
	readonly leadingClose: RegExp
	readonly opening: RegExp
	readonly closing: RegExp
	readonly ignoreCase: boolean
	dedents(name: string): boolean
	opens(name: string, tag: string, line: string): boolean
}

const HTML: TagDialect = {
	closing: /<\/(\w+)>/g,
	dedents: (name) => !INLINE_ELEMENTS.has(name.toLowerCase()),
	ignoreCase: true,
	leadingClose: /^<\/(\w+)/,
	opening: /<(\w+)(?:\s[^>]*)?>(?!<\/)/g,
	opens: (name, _tag, line) => {
		const lower = name.toLowerCase()
		return !VOID_ELEMENTS.has(lower) && !INLINE_ELEMENTS.has(lower) && !line.includes('/>')
	},
}

const XML: TagDialect = {
	closing: /<\/([\w:-]+)>/g,
	dedents: () => true,
	ignoreCase: false,
	leadingClose: /^<\/([\w:-]+)/,
	opening: /<([\w:-]+)(?:\s[^>]*)?>(?!<\/)/g,
	opens: (_name, tag) => !tag.endsWith('/>'),
}

function sameName(a: string, b: string, ignoreCase: boolean): boolean {
	return ignoreCase ? a.toLowerCase() === b.toLowerCase() : a === b
}

/** Opening tags on the line that no later closing tag on the same line matches. */
function unclosedTags(line: string, dialect: TagDialect): number {
	const closings = [...line.matchAll(dialect.closing)]
	let count = 0

	for (const opening of line.matchAll(dialect.opening)) {
		const name = opening[1] ?? ''
		if (!dialect.opens(name, opening[0], line)) continue

		const openedAt = opening.index ?? 0
		const closedLater = closings.some(
			(closing) =>
				(closing.index ?? 0) > openedAt && sameName(closing[1] ?? '', name, dialect.ignoreCase)
		)
		if (!closedLater) count++
	}
	return count
}

class TagPlanner implements LinePlanner {
	private readonly dialect: TagDialect
	private level = 0

	constructor(dialect: TagDialect) {
		this.dialect = dialect
	}

	next(trimmed: string): number {
		const leading = this.dialect.leadingClose.exec(trimmed)
		if (leading !== null && this.dialect.dedents(leading[1] ?? '')) {
			this.level = Math.max(0, this.level - 1)
		}

		const printLevel = this.level
		this.level += unclosedTags(trimmed, this.dialect)
		return printLevel
	}
}

export function formatHtml(code: string, options: IndentOptions): string {
	return reindent(code, options, new TagPlanner(HTML))
}

export function formatXml(code: string, options: IndentOptions): string {
	return reindent(code, options, new TagPlanner(XML))
}
