import { readFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { getTokenizer, type SupportedLanguage, type Token } from '@tintline/core'
import { type CliConfig, loadConfig } from '../config.ts'
import {
	formatConfigError,
	formatReadError,
	formatTokenLine,
	formatTokensJson,
	parseRange,
	resolveLanguage,
	type TextRange,
} from '../utils.ts'

export default class TokenizeCommand extends BaseCommand {
	static override commandName = 'tokenize'
	static override description = 'Print the tokens of a source file'

	@args.string({ description: 'Source file to tokenize' })
	declare file: string

	@flags.string({ alias: 'l', description: 'Language identifier (detected from the file name when omitted)' })
	declare language?: string

	@flags.boolean({ description: 'Print tokens as a JSON array' })
	declare json?: boolean

	@flags.string({ description: 'Only tokens intersecting start:length' })
	declare range?: string

	private readConfig(): CliConfig | null {
		try {
			return loadConfig()
		} catch (error: unknown) {
			this.logger.error(formatConfigError(error))
			this.exitCode = 1
			return null
		}
	}

	private async readSourceFile(): Promise<string | null> {
		try {
			return await readFile(this.file, 'utf-8')
		} catch (error: unknown) {
			this.logger.error(formatReadError(this.file, error))
			this.exitCode = 1
			return null
		}
	}

	private resolveRange(): TextRange | null | undefined {
		if (this.range === undefined) return undefined
		const range = parseRange(this.range)
		if (range === undefined) {
			this.logger.error(`Invalid range "${this.range}". Use start:length, e.g. 0:120.`)
			this.exitCode = 1
			return null
		}
		return range
	}

	private collectTokens(source: string, language: SupportedLanguage, range: TextRange | undefined): Token[] | null {
		const tokenizer = getTokenizer(language)
		if (tokenizer === undefined) {
			this.logger.error(`No tokenizer is registered for "${language}".`)
			this.exitCode = 1
			return null
		}
		return range === undefined
			? [...tokenizer.tokenize(source)]
			: [...tokenizer.tokenizeRange(source, range.start, range.length)]
	}

	override async run(): Promise<void> {
		const config = this.readConfig()
		if (config === null) return

		const resolution = resolveLanguage(this.file, this.language, config.language)
		if (!resolution.ok) {
			this.logger.error(resolution.error)
			this.exitCode = 1
			return
		}

		const range = this.resolveRange()
		if (range === null) return

		const source = await this.readSourceFile()
		if (source === null) return

		const tokens = this.collectTokens(source, resolution.language, range)
		if (tokens === null) return
		if (this.json === true) {
			console.log(formatTokensJson(tokens, source))
			return
		}
		for (const token of tokens) {
			console.log(formatTokenLine(token, source))
		}
	}
}
