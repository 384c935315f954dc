/**
 * JSON re-printer.
 * Streams characters, drops whitespace outside strings and rebuilds the layout
 * from the brackets. Invalid JSON is re-printed on the same terms.
 */

import { type IndentOptions, indentUnit } from './lines.ts'

const CLOSER_OF: Readonly<Record<string, string>> = { '[': ']', '{': '}' }

function isWhitespace(char: string): boolean {
	return char === ' ' || char === '\t' || char === '\r' || char === '\n'
}

function nextSignificant(code: string, from: number): number {
	let index = from
	while (index < code.length && isWhitespace(code.charAt(index))) index++
	return index
}

export function formatJson(code: string, options: IndentOptions): string {
	const unit = indentUnit(options)
	let output = ''
	let level = 0
	let inString = false
	let escaped = false

	const newline = (): void => {
		output += `\n${unit.repeat(level)}`
	}

	for (let i = 0; i < code.length; i++) {
		const char = code.charAt(i)

		if (inString) {
			output += char
			if (escaped) escaped = false
			else if (char === '\\') escaped = true
			else if (char === '"') inString = false
			continue
		}

		switch (char) {
			case '"':
				inString = true
				output += char
				break
			case '{':
			case '[': {
				const after = nextSignificant(code, i + 1)
				const closer = CLOSER_OF[char] ?? ''
				if (code.charAt(after) === closer) {
					output += char + closer
					i = after
					break
				}
				output += char
				level++
				newline()
				break
			}
			case '}':
			case ']':
				level = Math.max(0, level - 1)
				newline()
				output += char
				break
			case ',':
				output += char
				newline()
				break
			case ':':
				output += ': '
				break
			default:
				if (!isWhitespace(char)) output += char
		}
	}

	return output
}
