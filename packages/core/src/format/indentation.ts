/**
 * Formatters for languages where leading whitespace is the structure.
 * The existing depth is measured and re-emitted with the requested unit.
 */

import { type IndentOptions, type LinePlanner, reindent } from './lines.ts'

/** Leading width with a tab counting as tabWidth columns. */
export function leadingWidth(line: string, tabWidth: number): number {
	let width = 0
	for (const char of line) {
		if (char === ' ') width += 1
		else if (char === '\t') width += tabWidth
		else break
	}
	return width
}

function depthPlanner(tabWidth: number, divisor: number): LinePlanner {
	return {
		next: (_trimmed, line) => Math.floor(leadingWidth(line, tabWidth) / divisor),
	}
}

export function formatPython(code: string, options: IndentOptions): string {
	return reindent(code, options, depthPlanner(options.indentSize, options.indentSize))
}

// YAML sources are read as two-column indented whatever the output unit is.
export function formatYaml(code: string, options: IndentOptions): string {
	return reindent(code, options, depthPlanner(options.indentSize, 2))
}
