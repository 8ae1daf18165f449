import { Command } from 'commander'
import { parsePositiveInt, parseScore, printHeading, printJson, printSources, printSupport } from '../output.js'
import { runWithSession } from '../session.js'

interface AskOptions {
	k?: number
	minScore?: number
	document?: string[]
}

export const askCommand = new Command('ask')
	.description('Ask a question about your study material')
	.argument('<question>', 'The question to answer')
	.option('-k, --k <count>', 'Number of passages to retrieve', parsePositiveInt)
	.option('--min-score <score>', 'Minimum similarity for a passage', parseScore)
	.option('-d, --document <ids...>', 'Only search these documents')
	.action(async (question: string, options: AskOptions, command: Command) => {
		await runWithSession(command, 'Thinking...', true, async ({ corpus, json }, spinner) => {
			const generation = await corpus.ask(question, {
				k: options.k,
				minScore: options.minScore,
				documentIds: options.document,
			})
			spinner.stop()

			if (json) {
				printJson(generation)
				return
			}
			printHeading('Answer')
			console.log(generation.value)
			printSupport(generation)
			printSources(generation.passages)
		})
	})
