import { BaseCommand } from '@adonisjs/ace'
import { formatLanguageTable } from '../utils.ts'

export default class LanguagesCommand extends BaseCommand {
	static override commandName = 'languages'
	static override description = 'List supported languages and their formatter family'

	override async run(): Promise<void> {
		for (const line of formatLanguageTable()) {
			console.log(line)
		}
	}
}
