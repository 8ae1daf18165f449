import chalk from 'chalk'
import { Command } from 'commander'
import { table } from 'table'
import { readInputFiles } from '../../ingest/files.js'
import { printJson } from '../output.js'
import { runWithSession } from '../session.js'

interface IngestOptions {
	type?: string
}

export const ingestCommand = new Command('ingest')
	.description('Add study material (txt, md, pdf, docx) to the corpus')
	.argument('<files...>', 'Files to ingest')
	.option('-t, --type <mime>', 'MIME type for every file, instead of guessing from the extension')
	.action(async (files: string[], options: IngestOptions, command: Command) => {
		await runWithSession(command, `Ingesting ${files.length} file(s)...`, false, async ({ corpus, json }, spinner) => {
			const { inputs, failures } = await readInputFiles(files, { mimeType: options.type })
			const ingested = await corpus.ingest(inputs)
			const report = { ...ingested, failed: [...failures, ...ingested.failed] }

			if (json) {
				printJson({
					...report,
					failed: report.failed.map(({ sourceName, error }) => ({ sourceName, code: error.code, error: error.message })),
				})
				return
			}

			spinner.succeed(
				`Added ${report.added.length}, skipped ${report.skipped.length}, failed ${report.failed.length} in corpus "${corpus.id}"`,
			)
			const rows = [['File', 'Status', 'Details']]
			for (const added of report.added) {
				rows.push([added.sourceName, chalk.green('Added'), `${added.documentId} · ${added.chunks} chunks`])
			}
			for (const skipped of report.skipped) {
				rows.push([skipped.sourceName, chalk.yellow('Unchanged'), skipped.documentId])
			}
			for (const failed of report.failed) {
				rows.push([failed.sourceName, chalk.red('Failed'), failed.error.message])
			}
			console.log(table(rows, { columns: { 2: { width: 50, wrapWord: true } } }))
			if (report.failed.length > 0) process.exitCode = 1
		})
	})
