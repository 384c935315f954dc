/**
 * Shell formatters: Bash keyword blocks and PowerShell brace blocks.
 */

import { type IndentOptions, type LinePlanner, reindent, startsWithWord } from './lines.ts'

// ============================================================================
// Bash
// ============================================================================

const BASH_CLOSERS = ['fi', 'done', 'esac'] as const
const BASH_MID_BLOCK = ['else', 'elif'] as const

const BASH_OPENER_AT_END = /(?:\b(?:then|do)|[{(])\s*;?$/
const CASE_HEADER = /^case\b.*\bin$/
// Pattern characters exclude `(`, so a command substitution never reads as a pattern.
const CASE_PATTERN = /^[\w\s|*?.'"[\]$-]+\)$/
const CASE_ITEM_INLINE = /^[\w\s|*?.'"[\]$-]+\)\s*\S/
const CASE_ITEM_END = /;;&?$|;&$/

function isBashCloser(trimmed: string): boolean {
	if (trimmed.startsWith('}') || trimmed.startsWith(')')) return true
	return BASH_CLOSERS.some((word) => startsWithWord(trimmed, word))
}

class BashPlanner implements LinePlanner {
	private level = 0
	// One entry per open case; true while one of its items is open.
	private readonly caseItems: boolean[] = []

	next(trimmed: string): number {
		if (trimmed.startsWith('#')) return this.level

		if (BASH_MID_BLOCK.some((word) => startsWithWord(trimmed, word))) {
			return Math.max(0, this.level - 1)
		}
		if (isBashCloser(trimmed)) {
			if (startsWithWord(trimmed, 'esac') && this.caseItems.pop() === true) {
				this.level = Math.max(0, this.level - 1)
			}
			this.level = Math.max(0, this.level - 1)
		}

		const printLevel = this.level
		if (CASE_ITEM_END.test(trimmed)) {
			if (!CASE_ITEM_INLINE.test(trimmed) && this.itemOpen() === true) {
				this.level = Math.max(0, this.level - 1)
				this.setItemOpen(false)
			}
		} else if (CASE_HEADER.test(trimmed)) {
			this.level++
			this.caseItems.push(false)
		} else if (this.itemOpen() === false && CASE_PATTERN.test(trimmed)) {
			this.level++
			this.setItemOpen(true)
		} else if (BASH_OPENER_AT_END.test(trimmed)) {
			this.level++
		}
		return printLevel
	}

	private itemOpen(): boolean | undefined {
		return this.caseItems[this.caseItems.length - 1]
	}

	private setItemOpen(open: boolean): void {
		if (this.caseItems.length > 0) this.caseItems[this.caseItems.length - 1] = open
	}
}

export function formatBash(code: string, options: IndentOptions): string {
	return reindent(code, options, new BashPlanner())
}

// ============================================================================
// PowerShell
// ============================================================================

const POWERSHELL_MID_BLOCK = ['else', 'elseif', 'catch', 'finally'] as const

class PowerShellPlanner implements LinePlanner {
	private level = 0
	private previousStartedWithCloser = false

	next(trimmed: string): number {
		if (trimmed.startsWith('#') && !trimmed.startsWith('#>')) return this.level

		const startsWithCloser = trimmed.startsWith('}') || trimmed.startsWith(')')
		if (startsWithCloser) {
			this.level = Math.max(0, this.level - 1)
		}

		const midBlock = POWERSHELL_MID_BLOCK.some((word) => startsWithWord(trimmed, word, true))
		const printLevel =
			midBlock && !this.previousStartedWithCloser ? Math.max(0, this.level - 1) : this.level

		if (trimmed.endsWith('{') || trimmed.endsWith('(')) this.level++
		this.previousStartedWithCloser = startsWithCloser
		return printLevel
	}
}

export function formatPowerShell(code: string, options: IndentOptions): string {
	return reindent(code, options, new PowerShellPlanner())
}
