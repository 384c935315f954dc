/**
 * Priority-driven regex lexer.
 *
 * At every position each rule is tried anchored there; the highest priority
 * wins, then the longest match. Text no rule covers becomes one-character
 * PlainText tokens, so the output always partitions the input.
 */

import { createToken, shiftToken, type Token, TokenType, tokenEnd } from '../core/tokens.ts'
import type { Grammar } from './grammar.ts'
import type { KeywordTable } from './keywords.ts'
import { type PatternRule, stickyPattern } from './rule.ts'

interface CompiledRule {
	readonly rule: PatternRule
	readonly matcher: RegExp
}

interface Match {
	readonly rule: PatternRule
	readonly length: number
}

const compiledRules = new WeakMap<Grammar, readonly CompiledRule[]>()

// lastIndex is set and read within one synchronous exec call, so sharing a matcher is safe
function compile(grammar: Grammar): readonly CompiledRule[] {
	let compiled = compiledRules.get(grammar)
	if (compiled === undefined) {
		compiled = grammar.rules.map((rule) => ({ matcher: stickyPattern(rule.pattern), rule }))
		compiledRules.set(grammar, compiled)
	}
	return compiled
}

function matchAt(text: string, position: number, rules: readonly CompiledRule[]): Match | undefined {
	let best: Match | undefined
	for (const { matcher, rule } of rules) {
		matcher.lastIndex = position
		const result = matcher.exec(text)
		if (result === null) continue

		const length = result[0].length
		if (length === 0) continue

		if (
			best === undefined ||
			rule.priority > best.rule.priority ||
			(rule.priority === best.rule.priority && length > best.length)
		) {
			best = { length, rule }
		}
	}
	return best
}

function classify(type: TokenType, text: string, keywords: KeywordTable | undefined): TokenType {
	if (type !== TokenType.Identifier || keywords === undefined) return type
	return keywords.lookup(text) ?? type
}

/**
 * Lazily tokenizes text.
 * Tokens are contiguous, non-overlapping and cover `[0, text.length)`.
 */
export function* tokenize(text: string, grammar: Grammar): Generator<Token, void, undefined> {
	const rules = compile(grammar)
	let position = 0

	while (position < text.length) {
		const match = matchAt(text, position, rules)
		if (match === undefined) {
			yield createToken(position, 1, TokenType.PlainText)
			position += 1
			continue
		}

		const { length, rule } = match
		if (rule.embed === undefined) {
			const type = classify(rule.type, text.slice(position, position + length), grammar.keywords)
			yield createToken(position, length, type)
		} else {
			const span = text.slice(position, position + length)
			for (const inner of tokenize(span, rule.embed)) {
				yield shiftToken(inner, position)
			}
		}
		position += length
	}
}

/**
 * Tokens of a full tokenization that intersect `[start, start + length)`.
 * Not an incremental re-lex: the whole text is scanned.
 */
export function* tokenizeRange(
	text: string,
	grammar: Grammar,
	start: number,
	length: number
): Generator<Token, void, undefined> {
	const end = start + length
	for (const token of tokenize(text, grammar)) {
		if (token.start >= end) return
		if (tokenEnd(token) > start) yield token
	}
}
