import { mkdirSync } from 'node:fs'
import { join } from 'node:path'
import chalk from 'chalk'
import type { Command } from 'commander'
import ora, { type Ora } from 'ora'
import { type StoreType, type StudyMateConfig, loadConfig, toCorpusSettings } from '../config.js'
import { StudyCorpus } from '../corpus.js'
import { HashingEmbeddingProvider } from '../embeddings/hashing.js'
import { OpenAIEmbeddingProvider } from '../embeddings/openai.js'
import { ResilientEmbeddingProvider } from '../embeddings/resilient.js'
import { errorMessage, InvalidConfigError } from '../errors.js'
import { OpenAIGenerativeModel } from '../generation/openai.js'
import { DocumentIngestor } from '../ingest/ingestor.js'
import { ConsoleLogger } from '../logger.js'
import { FileCorpusStore } from '../store/file.js'
import { InMemoryCorpusStore } from '../store/memory.js'
import { SqliteCorpusStore } from '../store/sqlite.js'
import type { CorpusStore, EmbeddingProvider, Logger } from '../types.js'

export interface GlobalOptions {
	corpus?: string
	store?: string
	storePath?: string
	offline?: boolean
	json?: boolean
}

export interface Session {
	corpus: StudyCorpus
	config: StudyMateConfig
	json: boolean
	close: () => void
}

function resolveStoreType(value: string | undefined, fallback: StoreType): StoreType {
	if (value === undefined) return fallback
	if (value === 'sqlite' || value === 'file' || value === 'memory') return value
	throw new InvalidConfigError(`--store must be sqlite, file or memory, got "${value}"`, 'store')
}

function createEmbeddings(config: StudyMateConfig, offline: boolean, logger: Logger): EmbeddingProvider {
	const { embedding } = config
	if (offline || embedding.provider === 'hashing') {
		return new HashingEmbeddingProvider(embedding.dimensions || 256)
	}
	return new ResilientEmbeddingProvider(
		new OpenAIEmbeddingProvider({ model: embedding.model, dimensions: embedding.dimensions || undefined }),
		{
			batchSize: embedding.batchSize,
			concurrency: embedding.concurrency,
			timeoutMs: embedding.timeoutMs,
			maxRetries: embedding.maxRetries,
			logger,
		},
	)
}

function createStore(type: StoreType, path: string): { store: CorpusStore; close: () => void } {
	switch (type) {
		case 'sqlite': {
			mkdirSync(path, { recursive: true })
			const store = new SqliteCorpusStore({ databasePath: join(path, 'studymate.db'), walMode: true })
			return { store, close: () => store.close() }
		}
		case 'file':
			return { store: new FileCorpusStore({ directory: join(path, 'corpora') }), close: () => {} }
		case 'memory':
			return { store: new InMemoryCorpusStore(), close: () => {} }
	}
}

/** Loads config, then opens the selected corpus with the configured providers and store. */
export async function openSession(options: GlobalOptions, { needsModel = false } = {}): Promise<Session> {
	const { config } = loadConfig()
	const logger = new ConsoleLogger(config.logLevel)
	const { store, close } = createStore(resolveStoreType(options.store, config.store.type), options.storePath ?? config.store.path)

	try {
		const corpus = await StudyCorpus.open(options.corpus ?? config.corpus, {
			embeddings: createEmbeddings(config, options.offline ?? false, logger),
			model: needsModel
				? new OpenAIGenerativeModel({ model: config.generation.model, temperature: config.generation.temperature })
				: undefined,
			store,
			ingestor: new DocumentIngestor({
				maxBytes: config.ingestion.maxBytes,
				concurrency: config.ingestion.concurrency,
				logger,
			}),
			settings: toCorpusSettings(config),
			logger,
		})
		return { corpus, config, json: options.json ?? false, close }
	} catch (error) {
		close()
		throw error
	}
}

/**
 * Runs a command body inside a session with a spinner. Failures end the spinner
 * with the error message and set exit status 1.
 */
export async function runWithSession(
	command: Command,
	text: string,
	needsModel: boolean,
	task: (session: Session, spinner: Ora) => Promise<void>,
): Promise<void> {
	const options = command.optsWithGlobals<GlobalOptions>()
	const spinner = ora({ text, isSilent: options.json ?? false }).start()
	let session: Session | undefined

	try {
		session = await openSession(options, { needsModel })
		await task(session, spinner)
	} catch (error) {
		if (options.json) console.error(JSON.stringify({ error: errorMessage(error) }))
		else spinner.fail(chalk.red(errorMessage(error)))
		process.exitCode = 1
	} finally {
		session?.close()
	}
}
