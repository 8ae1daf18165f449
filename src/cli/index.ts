#!/usr/bin/env node

import 'dotenv/config'
import { Command } from 'commander'
import { askCommand } from './commands/ask.js'
import { docsCommand, removeCommand } from './commands/documents.js'
import { ingestCommand } from './commands/ingest.js'
import { flashcardsCommand, planCommand, quizCommand, summarizeCommand } from './commands/study.js'

const program = new Command()

program
	.name('studymate')
	.description('StudyMate CLI - study from your own course material')
	.version('0.1.0')
	.option('-c, --corpus <id>', 'Corpus to use (default: from config)')
	.option('-s, --store <type>', 'Corpus store: sqlite, file or memory')
	.option('--store-path <dir>', 'Directory the store keeps its data in')
	.option('--offline', 'Embed locally with the hashing embedder')
	.option('--json', 'Output in JSON format')

program.addCommand(ingestCommand)
program.addCommand(askCommand)
program.addCommand(quizCommand)
program.addCommand(flashcardsCommand)
program.addCommand(summarizeCommand)
program.addCommand(planCommand)
program.addCommand(docsCommand)
program.addCommand(removeCommand)

await program.parseAsync()
