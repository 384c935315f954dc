import {
	type DiagnosticArgs,
	GRAMMAR_DIAGNOSTICS,
	type GrammarDiagnosticCode,
	interpolateMessage,
	severityLabel,
} from '@tintline/diagnostics'
import type { LintIssue } from '../types.ts'

export function createIssue(
	code: GrammarDiagnosticCode,
	rule: string,
	args: DiagnosticArgs,
	aiHint: string | undefined
): LintIssue {
	const def = GRAMMAR_DIAGNOSTICS[code]
	return {
		aiHint,
		code,
		message: interpolateMessage(def.message, args),
		rule,
		severity: severityLabel(def.severity),
	}
}
