/**
 * SQL formatter for the T-SQL and PL/SQL dialects.
 * Only procedural blocks indent; query clauses keep their author's layout.
 */

import { type IndentOptions, type LinePlanner, reindent } from './lines.ts'

export const SqlDialect = {
	MsSql: 'mssql',
	Oracle: 'oracle',
} as const

export type SqlDialect = (typeof SqlDialect)[keyof typeof SqlDialect]

const CLOSER = /^END\b/
const LEADING_OPENER = /^(?:BEGIN|CASE)\b/
const TRAILING_OPENER = /(?<!\bEND\s+)\b(?:BEGIN|CASE)$/
const TRANSACTION = /^BEGIN\s+(?:TRAN|TRANSACTION|DISTRIBUTED)\b/
const ORACLE_LOOP = /(?<!\bEND\s+)\bLOOP$/
const ORACLE_IF = /^IF\b.*\bTHEN$/
const ORACLE_MID_BLOCK = /^(?:ELSE|ELSIF|EXCEPTION)\b/

// An END after the opener closes the block on the same line.
function closesOnSameLine(upper: string, opener: RegExp): boolean {
	const match = opener.exec(upper)
	if (match === null) return false
	return /\bEND\b/.test(upper.slice(match.index + match[0].length))
}

function opensSqlBlock(upper: string, dialect: SqlDialect): boolean {
	if (TRANSACTION.test(upper)) return false

	for (const opener of [LEADING_OPENER, TRAILING_OPENER]) {
		if (opener.test(upper) && !closesOnSameLine(upper, opener)) return true
	}
	if (dialect === SqlDialect.Oracle) {
		return ORACLE_LOOP.test(upper) || ORACLE_IF.test(upper)
	}
	return false
}

class SqlPlanner implements LinePlanner {
	private readonly dialect: SqlDialect
	private level = 0

	constructor(dialect: SqlDialect) {
		this.dialect = dialect
	}

	next(trimmed: string): number {
		const upper = trimmed.toUpperCase()

		if (this.dialect === SqlDialect.Oracle && ORACLE_MID_BLOCK.test(upper)) {
			return Math.max(0, this.level - 1)
		}
		if (CLOSER.test(upper)) {
			this.level = Math.max(0, this.level - 1)
		}

		const printLevel = this.level
		if (opensSqlBlock(upper, this.dialect)) this.level++
		return printLevel
	}
}

export function formatSql(code: string, options: IndentOptions, dialect: SqlDialect): string {
	return reindent(code, options, new SqlPlanner(dialect))
}
