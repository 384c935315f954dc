/**
 * Brace-counting formatters for C-family languages and Go.
 */

import { type IndentOptions, type LinePlanner, reindent } from './lines.ts'

export interface BraceCount {
	readonly open: number
	readonly close: number
}

/** A multi-line literal left open at the end of a line. */
export type OpenLiteral = 'verbatim' | 'raw' | null

export interface BraceScanOptions {
	/** C# `@"`, `$@"` and `@$"` strings, where `""` is an escaped quote. */
	readonly verbatim?: boolean
	/** Go backtick strings. */
	readonly rawStrings?: boolean
	/** Rust lifetimes such as `'a`, which are not character literals. */
	readonly lifetimes?: boolean
}

export interface BraceScan extends BraceCount {
	readonly openLiteral: OpenLiteral
}

const LIFETIME = /'[A-Za-z_]\w*(?![\w'])/y

function verbatimOpenerLength(line: string, index: number): number {
	if (line.startsWith('@"', index)) return 2
	if (line.startsWith('$@"', index) || line.startsWith('@$"', index)) return 3
	return 0
}

/**
 * Counts `{` and `}` outside literals, starting inside `openLiteral` when a previous
 * line left one open. Backslash escapes apply inside quotes only; `//` ends the scan.
 */
export function scanBraces(line: string, openLiteral: OpenLiteral, options: BraceScanOptions = {}): BraceScan {
	let open = 0
	let close = 0
	let literal = openLiteral
	let quote: string | null = null
	let escaped = false

	for (let i = 0; i < line.length; i++) {
		const char = line.charAt(i)

		if (literal === 'verbatim') {
			if (char !== '"') continue
			if (line.charAt(i + 1) === '"') i++
			else literal = null
			continue
		}
		if (literal === 'raw') {
			if (char === '`') literal = null
			continue
		}
		if (escaped) {
			escaped = false
			continue
		}
		if (quote !== null) {
			if (char === '\\') escaped = true
			else if (char === quote) quote = null
			continue
		}

		const opener = options.verbatim === true ? verbatimOpenerLength(line, i) : 0
		if (opener > 0) {
			literal = 'verbatim'
			i += opener - 1
			continue
		}
		if (options.rawStrings === true && char === '`') {
			literal = 'raw'
			continue
		}
		if (options.lifetimes === true && char === "'") {
			LIFETIME.lastIndex = i
			if (LIFETIME.test(line)) {
				i = LIFETIME.lastIndex - 1
				continue
			}
		}

		if (char === '"' || char === "'") {
			quote = char
		} else if (char === '/' && line.charAt(i + 1) === '/') {
			break
		} else if (char === '{') {
			open++
		} else if (char === '}') {
			close++
		}
	}

	return { close, open, openLiteral: literal }
}

/** Brace counts of a single line with no literal open before it. */
export function countBraces(line: string, options: BraceScanOptions = {}): BraceCount {
	const { close, open } = scanBraces(line, null, options)
	return { close, open }
}

/** True when the line holds a `)` and nothing besides `)`, `;`, `,` and whitespace. */
export function hasOnlyClosingParens(line: string): boolean {
	return /^[\s);,]*$/.test(line) && line.includes(')')
}

function startsWithCloser(trimmed: string): boolean {
	if (trimmed.startsWith('}') || trimmed.startsWith(']')) return true
	return trimmed.startsWith(')') && hasOnlyClosingParens(trimmed)
}

// Tracks /* ... */ spans that cover whole lines.
function updateBlockComment(inComment: boolean, trimmed: string): boolean {
	if (trimmed.includes('/*') && !trimmed.includes('*/')) return true
	if (trimmed.includes('*/')) return false
	return inComment
}

// Brace planners share comment and literal tracking; lines that start inside a
// literal are its content and never dedent.
class BracePlanner implements LinePlanner {
	private level = 0
	private inComment = false
	private openLiteral: OpenLiteral = null
	private readonly options: BraceScanOptions
	private readonly isCloser: (trimmed: string) => boolean

	constructor(options: BraceScanOptions, isCloser: (trimmed: string) => boolean) {
		this.options = options
		this.isCloser = isCloser
	}

	next(trimmed: string): number {
		const startedInLiteral = this.openLiteral !== null
		if (!startedInLiteral) {
			this.inComment = updateBlockComment(this.inComment, trimmed)
		}

		let counted: BraceCount = { close: 0, open: 0 }
		if (!this.inComment) {
			const scan = scanBraces(trimmed, this.openLiteral, this.options)
			counted = scan
			this.openLiteral = scan.openLiteral
		}

		const printLevel =
			!startedInLiteral && this.isCloser(trimmed) ? Math.max(0, this.level - 1) : this.level
		this.level = Math.max(0, this.level + counted.open - counted.close)
		return printLevel
	}
}

function startsWithGoCloser(trimmed: string): boolean {
	return trimmed.startsWith('}') || trimmed.startsWith(')')
}

export function formatCStyle(code: string, options: IndentOptions, scan: BraceScanOptions = {}): string {
	return reindent(code, options, new BracePlanner(scan, startsWithCloser))
}

export function formatGo(code: string, options: IndentOptions): string {
	return reindent(code, options, new BracePlanner({ rawStrings: true }, startsWithGoCloser))
}
