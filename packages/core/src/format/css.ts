/**
 * CSS and SCSS formatter. Braces are counted as-is; strings are not excluded.
 */

import { countOf, type IndentOptions, type LinePlanner, reindent } from './lines.ts'

class CssPlanner implements LinePlanner {
	private level = 0

	next(trimmed: string): number {
		const printLevel = trimmed.startsWith('}') ? Math.max(0, this.level - 1) : this.level
		this.level = Math.max(0, this.level + countOf(trimmed, '{') - countOf(trimmed, '}'))
		return printLevel
	}
}

export function formatCss(code: string, options: IndentOptions): string {
	return reindent(code, options, new CssPlanner())
}
