import { readFile, writeFile } from 'node:fs/promises'
import { args, BaseCommand, flags } from '@adonisjs/ace'
import { format } from '@tintline/core'
import { type CliConfig, loadConfig } from '../config.ts'
import {
	formatConfigError,
	formatIndentSizeError,
	formatReadError,
	formatWriteError,
	isValidIndentSize,
	resolveLanguage,
} from '../utils.ts'

export default class FormatCommand extends BaseCommand {
	static override commandName = 'format'
	static override description = 'Re-indent a source file'

	@args.string({ description: 'Source file to format' })
	declare file: string

	@flags.string({ alias: 'l', description: 'Language identifier (detected from the file name when omitted)' })
	declare language?: string

	@flags.number({ alias: 'i', description: 'Columns per indentation level (1-16)' })
	declare indentSize?: number

	@flags.boolean({ description: 'Indent with tabs instead of spaces' })
	declare tabs?: boolean

	@flags.boolean({ alias: 'w', description: 'Write the result back to the file' })
	declare write?: boolean

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

	private async writeSourceFile(content: string): Promise<void> {
		try {
			await writeFile(this.file, content)
		} catch (error: unknown) {
			this.logger.error(formatWriteError(error))
			this.exitCode = 1
		}
	}

	override async run(): Promise<void> {
		const config = this.readConfig()
		if (config === null) return

		const indentSize = this.indentSize ?? config.indentSize
		if (!isValidIndentSize(indentSize)) {
			this.logger.error(formatIndentSizeError(indentSize))
			this.exitCode = 1
			return
		}

		const resolution = resolveLanguage(this.file, this.language, config.language)
		if (!resolution.ok) {
			this.logger.error(resolution.error)
			this.exitCode = 1
			return
		}

		const source = await this.readSourceFile()
		if (source === null) return

		const useSpaces = !(this.tabs ?? config.useTabs)
		const formatted = format(source, resolution.language, indentSize, useSpaces)

		if (this.write === true) {
			await this.writeSourceFile(formatted)
			return
		}
		process.stdout.write(formatted)
	}
}
