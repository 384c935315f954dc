/**
 * Keyword tables.
 * Tables live as JSON under data/keywords and are validated when a grammar loads them.
 */

import { readFileSync } from 'node:fs'
import { z } from 'zod'
import { TokenType } from '../core/tokens.ts'

/**
 * Thrown when a keyword data file is missing or malformed.
 * Tables ship with the package, so this always points at a packaging defect.
 */
export class KeywordTableError extends Error {
	readonly table: string

	constructor(message: string, table: string) {
		super(message)
		this.name = 'KeywordTableError'
		this.table = table
	}
}

const KeywordFileSchema = z.object({
	caseInsensitive: z.boolean().default(false),
	keywords: z.partialRecord(z.enum(TokenType), z.array(z.string().min(1))),
})

export type KeywordFile = z.infer<typeof KeywordFileSchema>

export type KeywordGroups = Partial<Record<TokenType, readonly string[]>>

/**
 * Literal word to token type.
 * Case-insensitive tables store and look up lower-cased keys.
 */
export class KeywordTable {
	readonly caseInsensitive: boolean
	private readonly words: ReadonlyMap<string, TokenType>

	constructor(groups: KeywordGroups, caseInsensitive = false) {
		this.caseInsensitive = caseInsensitive
		const words = new Map<string, TokenType>()
		for (const type of Object.values(TokenType)) {
			for (const word of groups[type] ?? []) {
				const key = caseInsensitive ? word.toLowerCase() : word
				// First group wins on duplicates
				if (!words.has(key)) words.set(key, type)
			}
		}
		this.words = words
	}

	get size(): number {
		return this.words.size
	}

	lookup(text: string): TokenType | undefined {
		return this.words.get(this.caseInsensitive ? text.toLowerCase() : text)
	}

	entries(): IterableIterator<[string, TokenType]> {
		return this.words.entries()
	}
}

export function parseKeywordFile(raw: unknown, table: string): KeywordTable {
	const result = KeywordFileSchema.safeParse(raw)
	if (!result.success) {
		throw new KeywordTableError(
			`keyword table "${table}" is invalid:\n${z.prettifyError(result.error)}`,
			table
		)
	}
	return new KeywordTable(result.data.keywords, result.data.caseInsensitive)
}

/** Reads `data/keywords/<table>.json` shipped with this package. */
export function loadKeywords(table: string): KeywordTable {
	const url = new URL(`../../data/keywords/${table}.json`, import.meta.url)
	let text: string
	try {
		text = readFileSync(url, 'utf8')
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new KeywordTableError(`keyword table "${table}" cannot be read: ${reason}`, table)
	}

	let raw: unknown
	try {
		raw = JSON.parse(text)
	} catch (error) {
		const reason = error instanceof Error ? error.message : String(error)
		throw new KeywordTableError(`keyword table "${table}" is not valid JSON: ${reason}`, table)
	}
	return parseKeywordFile(raw, table)
}
