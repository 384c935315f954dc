import { type IndentOptions, type LinePlanner, reindent } from './lines.ts'

/** Lines continuing an instruction with a trailing backslash get one unit; everything else none. */
class ContinuationPlanner implements LinePlanner {
	private continued = false

	next(trimmed: string): number {
		const level = this.continued ? 1 : 0
		this.continued = trimmed.endsWith('\\')
		return level
	}

	blank(): void {
		this.continued = false
	}
}

export function formatDockerfile(code: string, options: IndentOptions): string {
	return reindent(code, options, new ContinuationPlanner())
}
