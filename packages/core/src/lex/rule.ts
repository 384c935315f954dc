import type { TokenType } from '../core/tokens.ts'
import type { Grammar } from './grammar.ts'

/**
 * One pattern of a grammar.
 * Precedence comes from priority alone; a higher number wins.
 */
export interface PatternRule {
	readonly pattern: RegExp
	readonly type: TokenType
	readonly priority: number
	/** Re-tokenize the matched span with this grammar instead of emitting one token. */
	readonly embed?: Grammar
}

export interface RuleOptions {
	readonly embed?: Grammar
}

export function rule(
	pattern: RegExp,
	type: TokenType,
	priority: number,
	options: RuleOptions = {}
): PatternRule {
	return options.embed === undefined
		? Object.freeze({ pattern, priority, type })
		: Object.freeze({ embed: options.embed, pattern, priority, type })
}

/**
 * Anchored copy of a rule's pattern.
 * Global and sticky flags on the source are dropped; the copy is always sticky.
 */
export function stickyPattern(pattern: RegExp): RegExp {
	const flags = pattern.flags.replace(/[gy]/g, '')
	return new RegExp(pattern.source, `${flags}y`)
}
