import chalk from 'chalk'
import { Command } from 'commander'
import { table } from 'table'
import { printJson } from '../output.js'
import { runWithSession } from '../session.js'

export const docsCommand = new Command('docs')
	.description('List the documents in the corpus')
	.action(async (_options: object, command: Command) => {
		await runWithSession(command, 'Loading corpus...', false, async ({ corpus, json }, spinner) => {
			const documents = corpus.listDocuments()
			const stats = corpus.stats()
			spinner.stop()

			if (json) {
				printJson({ stats, documents })
				return
			}
			console.log(chalk.bold.blue(`\n📚 Corpus "${stats.corpusId}"`))
			console.log(
				chalk.gray(`${stats.documents} documents · ${stats.chunks} chunks · ${stats.embeddingModel} (${stats.dimensions}d)`),
			)
			if (documents.length === 0) {
				console.log('\nNo documents yet. Add some with `studymate ingest <files...>`.')
				return
			}

			const rows = [['ID', 'Source', 'Type', 'Chunks', 'Ingested']]
			for (const doc of documents) {
				rows.push([doc.id, doc.sourceName, doc.mimeType, String(doc.chunks), doc.ingestedAt.toISOString()])
			}
			console.log(table(rows, { columns: { 3: { alignment: 'right' } } }))
		})
	})

export const removeCommand = new Command('remove')
	.description('Remove a document and its chunks from the corpus')
	.argument('<document-id>', 'Document ID, as shown by `studymate docs`')
	.action(async (documentId: string, _options: object, command: Command) => {
		await runWithSession(command, `Removing ${documentId}...`, false, async ({ corpus, json }, spinner) => {
			const removed = await corpus.removeDocument(documentId)
			if (json) {
				printJson({ documentId, removed })
			} else if (removed) {
				spinner.succeed(`Removed ${documentId} from corpus "${corpus.id}"`)
			} else {
				spinner.fail(`No document ${documentId} in corpus "${corpus.id}"`)
			}
			if (!removed) process.exitCode = 1
		})
	})
