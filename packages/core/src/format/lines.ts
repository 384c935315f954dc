/**
 * Shared line plumbing for the line-based formatter families.
 */

export interface IndentOptions {
	readonly indentSize: number
	readonly useSpaces: boolean
}

/**
 * Per-call indentation state machine.
 * `next` receives each non-blank line, trimmed and raw, and returns its print level.
 */
export interface LinePlanner {
	next(trimmed: string, line: string): number
	blank?(): void
}

const LINE_BREAK = /\r\n|\r|\n/

export function indentUnit(options: IndentOptions): string {
	return options.useSpaces ? ' '.repeat(options.indentSize) : '\t'
}

export function splitLines(code: string): string[] {
	return code.split(LINE_BREAK)
}

/**
 * Re-emits every line at the level the planner assigns.
 * Blank lines become empty; a trailing line break survives because the
 * split leaves an empty last line.
 */
export function reindent(code: string, options: IndentOptions, planner: LinePlanner): string {
	const unit = indentUnit(options)
	const output: string[] = []

	for (const line of splitLines(code)) {
		const trimmed = line.trim()
		if (trimmed.length === 0) {
			planner.blank?.()
			output.push('')
			continue
		}
		output.push(unit.repeat(Math.max(0, planner.next(trimmed, line))) + trimmed)
	}

	return output.join('\n')
}

/** Counts non-overlapping occurrences of needle. */
export function countOf(text: string, needle: string): number {
	let count = 0
	let index = text.indexOf(needle)
	while (index !== -1) {
		count++
		index = text.indexOf(needle, index + needle.length)
	}
	return count
}

/** Whole-word test for a keyword at the start of a line. */
export function startsWithWord(text: string, word: string, ignoreCase = false): boolean {
	const head = text.slice(0, word.length)
	const matches = ignoreCase ? head.toLowerCase() === word.toLowerCase() : head === word
	if (!matches) return false
	const after = text.charAt(word.length)
	return after === '' || !/\w/.test(after)
}
