import { BaseCommand, flags } from '@adonisjs/ace'
import { isSupportedLanguage, parseLanguage, SUPPORTED_LANGUAGES, type SupportedLanguage } from '@tintline/core'
import { formatDiagnostic, TLCLI004 } from '@tintline/diagnostics'
import {
	createJsonReporter,
	createSpecReporter,
	hasErrors,
	lintLanguages,
	type Reporter,
	reportResults,
} from '@tintline/grammar-lint'

export default class LintGrammarsCommand extends BaseCommand {
	static override commandName = 'lint-grammars'
	static override description = 'Check the built-in grammars for authoring mistakes'

	@flags.string({ alias: 'l', description: 'Lint a single language' })
	declare language?: string

	@flags.string({
		alias: 'f',
		default: 'spec',
		description: 'Output format: spec (default) or json',
	})
	declare format: string

	private selectLanguages(): readonly SupportedLanguage[] | null {
		if (this.language === undefined) return SUPPORTED_LANGUAGES

		const language = parseLanguage(this.language)
		if (language === undefined || !isSupportedLanguage(language)) {
			this.logger.error(formatDiagnostic(TLCLI004, { language: this.language }))
			this.exitCode = 1
			return null
		}
		return [language]
	}

	private createReporter(): Reporter | null {
		if (this.format === 'json') return createJsonReporter()
		if (this.format === 'spec') return createSpecReporter()

		this.logger.error(`Invalid format "${this.format}". Use "spec" or "json".`)
		this.exitCode = 1
		return null
	}

	override async run(): Promise<void> {
		const reporter = this.createReporter()
		if (reporter === null) return

		const languages = this.selectLanguages()
		if (languages === null) return

		const results = lintLanguages(languages)
		console.log(reportResults(results, reporter))

		if (hasErrors(results)) {
			this.exitCode = 1
		}
	}
}
