#!/usr/bin/env -S node --import tsx

import { HelpCommand, Kernel, ListLoader } from '@adonisjs/ace'
import FormatCommand from './commands/format.ts'
import LanguagesCommand from './commands/languages.ts'
import LintGrammarsCommand from './commands/lint-grammars.ts'
import TokenizeCommand from './commands/tokenize.ts'

const version = '0.1.0'

async function main(): Promise<void> {
	const kernel = Kernel.create()

	kernel.info.set('binary', 'tintline')
	kernel.info.set('version', version)

	kernel.defineFlag('help', {
		alias: 'h',
		description: 'Display help information',
		type: 'boolean',
	})

	kernel.defineFlag('version', {
		alias: 'v',
		description: 'Display version number',
		type: 'boolean',
	})

	kernel.addLoader(
		new ListLoader([TokenizeCommand, FormatCommand, LanguagesCommand, LintGrammarsCommand, HelpCommand])
	)

	kernel.on('finding:command', async () => {
		console.log(`tintline v${version}`)
		console.log('')
		console.log('Usage: tintline [command] [options]')
		console.log('')
		console.log('Commands:')
		console.log('  tokenize <file>     Print the tokens of a source file')
		console.log('  format <file>       Re-indent a source file')
		console.log('  languages           List supported languages')
		console.log('  lint-grammars       Check the built-in grammars')
		console.log('')
		console.log('Run "tintline --help" for available commands and options.')
		return true
	})

	await kernel.handle(process.argv.slice(2))
}

main().catch((error: unknown) => {
	console.error(error)
	process.exit(1)
})
