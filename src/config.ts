import { existsSync, readFileSync } from 'node:fs'
import { homedir } from 'node:os'
import { join } from 'node:path'
import { type ChunkOptions, DEFAULT_CHUNK_OPTIONS, resolveChunkOptions } from './chunker.js'
import type { CorpusSettings } from './corpus.js'
import { errorMessage, InvalidConfigError } from './errors.js'
import { isLogLevel, type LogLevel } from './logger.js'
import type { VectorIndexKind } from './types.js'

export type StoreType = 'sqlite' | 'file' | 'memory'
export type EmbeddingProviderType = 'openai' | 'hashing'

export interface StudyMateConfig {
	/** Corpus used when a command names none. */
	corpus: string
	logLevel: LogLevel
	chunking: Required<ChunkOptions>
	index: { kind: VectorIndexKind; clusters: number; nprobe: number; minClusterSize: number }
	embedding: {
		provider: EmbeddingProviderType
		model: string
		/** Requested vector size; the model's default when 0. */
		dimensions: number
		batchSize: number
		concurrency: number
		timeoutMs: number
		maxRetries: number
	}
	retrieval: { k: number; minScore: number }
	generation: {
		model: string
		temperature: number
		maxChars: number
		maxParseRetries: number
		maxRetries: number
		timeoutMs: number
	}
	ingestion: { maxBytes: number; concurrency: number }
	/** `path` is a directory: `studymate.db` for sqlite, `corpora/` for file. */
	store: { type: StoreType; path: string }
}

export interface LoadedConfig {
	config: StudyMateConfig
	/** The file the config was read from, if any. */
	source?: string
}

export interface LoadConfigOptions {
	env?: NodeJS.ProcessEnv
	cwd?: string
	home?: string
}

export function defaultConfig(home = homedir()): StudyMateConfig {
	return {
		corpus: 'default',
		logLevel: 'warn',
		chunking: { ...DEFAULT_CHUNK_OPTIONS },
		index: { kind: 'exact', clusters: 16, nprobe: 4, minClusterSize: 8 },
		embedding: {
			provider: 'openai',
			model: 'text-embedding-3-small',
			dimensions: 0,
			batchSize: 64,
			concurrency: 4,
			timeoutMs: 30_000,
			maxRetries: 2,
		},
		retrieval: { k: 5, minScore: 0.2 },
		generation: {
			model: 'gpt-4o-mini',
			temperature: 0.2,
			maxChars: 12_000,
			maxParseRetries: 1,
			maxRetries: 2,
			timeoutMs: 60_000,
		},
		ingestion: { maxBytes: 10 * 1024 * 1024, concurrency: 4 },
		store: { type: 'sqlite', path: join(home, '.studymate') },
	}
}

// =================================================================================
// Typed readers for untyped JSON
// =================================================================================

type Json = Record<string, unknown>

function isObject(value: unknown): value is Json {
	return typeof value === 'object' && value !== null && !Array.isArray(value)
}

function section(raw: Json, name: string): Json {
	const value = raw[name]
	if (value === undefined) return {}
	if (!isObject(value)) throw new InvalidConfigError(`"${name}" must be an object`, name)
	return value
}

function num(raw: Json, key: string, fallback: number, field: string): number {
	const value = raw[key]
	if (value === undefined) return fallback
	if (typeof value !== 'number' || !Number.isFinite(value)) {
		throw new InvalidConfigError(`"${field}" must be a number`, field)
	}
	return value
}

function str(raw: Json, key: string, fallback: string, field: string): string {
	const value = raw[key]
	if (value === undefined) return fallback
	if (typeof value !== 'string') throw new InvalidConfigError(`"${field}" must be a string`, field)
	return value
}

function oneOf<T extends string>(value: unknown, allowed: readonly T[], fallback: T, field: string): T {
	if (value === undefined) return fallback
	const match = allowed.find((candidate) => candidate === value)
	if (match === undefined) {
		throw new InvalidConfigError(`"${field}" must be one of ${allowed.join(', ')}`, field)
	}
	return match
}

/** Overlays a parsed config file on the defaults. Unknown keys are ignored. */
export function mergeConfig(base: StudyMateConfig, raw: unknown): StudyMateConfig {
	if (!isObject(raw)) throw new InvalidConfigError('Config file must contain a JSON object')

	const chunking = section(raw, 'chunking')
	const index = section(raw, 'index')
	const embedding = section(raw, 'embedding')
	const retrieval = section(raw, 'retrieval')
	const generation = section(raw, 'generation')
	const ingestion = section(raw, 'ingestion')
	const store = section(raw, 'store')

	return {
		corpus: str(raw, 'corpus', base.corpus, 'corpus'),
		logLevel: oneOf(raw.logLevel, ['debug', 'info', 'warn', 'error'], base.logLevel, 'logLevel'),
		chunking: {
			chunkSize: num(chunking, 'chunkSize', base.chunking.chunkSize, 'chunking.chunkSize'),
			overlap: num(chunking, 'overlap', base.chunking.overlap, 'chunking.overlap'),
			minChunkSize: num(chunking, 'minChunkSize', base.chunking.minChunkSize, 'chunking.minChunkSize'),
		},
		index: {
			kind: oneOf(index.kind, ['exact', 'clustered'], base.index.kind, 'index.kind'),
			clusters: num(index, 'clusters', base.index.clusters, 'index.clusters'),
			nprobe: num(index, 'nprobe', base.index.nprobe, 'index.nprobe'),
			minClusterSize: num(index, 'minClusterSize', base.index.minClusterSize, 'index.minClusterSize'),
		},
		embedding: {
			provider: oneOf(embedding.provider, ['openai', 'hashing'], base.embedding.provider, 'embedding.provider'),
			model: str(embedding, 'model', base.embedding.model, 'embedding.model'),
			dimensions: num(embedding, 'dimensions', base.embedding.dimensions, 'embedding.dimensions'),
			batchSize: num(embedding, 'batchSize', base.embedding.batchSize, 'embedding.batchSize'),
			concurrency: num(embedding, 'concurrency', base.embedding.concurrency, 'embedding.concurrency'),
			timeoutMs: num(embedding, 'timeoutMs', base.embedding.timeoutMs, 'embedding.timeoutMs'),
			maxRetries: num(embedding, 'maxRetries', base.embedding.maxRetries, 'embedding.maxRetries'),
		},
		retrieval: {
			k: num(retrieval, 'k', base.retrieval.k, 'retrieval.k'),
			minScore: num(retrieval, 'minScore', base.retrieval.minScore, 'retrieval.minScore'),
		},
		generation: {
			model: str(generation, 'model', base.generation.model, 'generation.model'),
			temperature: num(generation, 'temperature', base.generation.temperature, 'generation.temperature'),
			maxChars: num(generation, 'maxChars', base.generation.maxChars, 'generation.maxChars'),
			maxParseRetries: num(generation, 'maxParseRetries', base.generation.maxParseRetries, 'generation.maxParseRetries'),
			maxRetries: num(generation, 'maxRetries', base.generation.maxRetries, 'generation.maxRetries'),
			timeoutMs: num(generation, 'timeoutMs', base.generation.timeoutMs, 'generation.timeoutMs'),
		},
		ingestion: {
			maxBytes: num(ingestion, 'maxBytes', base.ingestion.maxBytes, 'ingestion.maxBytes'),
			concurrency: num(ingestion, 'concurrency', base.ingestion.concurrency, 'ingestion.concurrency'),
		},
		store: {
			type: oneOf(store.type, ['sqlite', 'file', 'memory'], base.store.type, 'store.type'),
			path: str(store, 'path', base.store.path, 'store.path'),
		},
	}
}

function envNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
	const value = env[name]
	if (value === undefined || value === '') return fallback
	const parsed = Number(value)
	if (!Number.isFinite(parsed)) throw new InvalidConfigError(`${name} must be a number, got "${value}"`, name)
	return parsed
}

/** Applies `STUDYMATE_*` environment variables on top of a config. */
export function applyEnv(config: StudyMateConfig, env: NodeJS.ProcessEnv): StudyMateConfig {
	const logLevel = env.STUDYMATE_LOG_LEVEL
	if (logLevel !== undefined && !isLogLevel(logLevel)) {
		throw new InvalidConfigError(`STUDYMATE_LOG_LEVEL must be debug, info, warn or error, got "${logLevel}"`)
	}

	return {
		...config,
		corpus: env.STUDYMATE_CORPUS || config.corpus,
		logLevel: logLevel ?? config.logLevel,
		chunking: {
			...config.chunking,
			chunkSize: envNumber(env, 'STUDYMATE_CHUNK_SIZE', config.chunking.chunkSize),
			overlap: envNumber(env, 'STUDYMATE_CHUNK_OVERLAP', config.chunking.overlap),
		},
		embedding: {
			...config.embedding,
			provider: oneOf(env.STUDYMATE_EMBEDDING_PROVIDER || undefined, ['openai', 'hashing'], config.embedding.provider, 'STUDYMATE_EMBEDDING_PROVIDER'),
			model: env.STUDYMATE_EMBEDDING_MODEL || config.embedding.model,
		},
		retrieval: {
			k: envNumber(env, 'STUDYMATE_TOP_K', config.retrieval.k),
			minScore: envNumber(env, 'STUDYMATE_MIN_SCORE', config.retrieval.minScore),
		},
		generation: {
			...config.generation,
			model: env.STUDYMATE_GENERATION_MODEL || config.generation.model,
		},
		store: {
			type: oneOf(env.STUDYMATE_STORE || undefined, ['sqlite', 'file', 'memory'], config.store.type, 'STUDYMATE_STORE'),
			path: env.STUDYMATE_STORE_PATH || config.store.path,
		},
	}
}

/** Rejects values that cannot produce a working pipeline. */
export function validateConfig(config: StudyMateConfig): StudyMateConfig {
	resolveChunkOptions(config.chunking)

	const positiveIntegers: Array<[string, number]> = [
		['retrieval.k', config.retrieval.k],
		['index.clusters', config.index.clusters],
		['index.nprobe', config.index.nprobe],
		['index.minClusterSize', config.index.minClusterSize],
		['embedding.batchSize', config.embedding.batchSize],
		['embedding.concurrency', config.embedding.concurrency],
		['generation.maxChars', config.generation.maxChars],
		['ingestion.maxBytes', config.ingestion.maxBytes],
		['ingestion.concurrency', config.ingestion.concurrency],
	]
	for (const [field, value] of positiveIntegers) {
		if (!Number.isInteger(value) || value < 1) {
			throw new InvalidConfigError(`"${field}" must be a positive integer, got ${value}`, field)
		}
	}

	const nonNegativeIntegers: Array<[string, number]> = [
		['embedding.dimensions', config.embedding.dimensions],
		['embedding.maxRetries', config.embedding.maxRetries],
		['generation.maxParseRetries', config.generation.maxParseRetries],
		['generation.maxRetries', config.generation.maxRetries],
	]
	for (const [field, value] of nonNegativeIntegers) {
		if (!Number.isInteger(value) || value < 0) {
			throw new InvalidConfigError(`"${field}" must be a non-negative integer, got ${value}`, field)
		}
	}

	if (config.index.nprobe > config.index.clusters) {
		throw new InvalidConfigError('"index.nprobe" must not exceed "index.clusters"', 'index.nprobe')
	}
	if (config.retrieval.minScore < -1 || config.retrieval.minScore > 1) {
		throw new InvalidConfigError('"retrieval.minScore" must be between -1 and 1', 'retrieval.minScore')
	}
	if (config.corpus.trim().length === 0) {
		throw new InvalidConfigError('"corpus" must not be empty', 'corpus')
	}
	return config
}

function configPaths(cwd: string, home: string): string[] {
	return [join(cwd, '.studymate.json'), join(home, '.studymate', 'config.json')]
}

/**
 * Loads configuration: defaults, then the first config file found
 * (`STUDYMATE_CONFIG`, `./.studymate.json`, `~/.studymate/config.json`),
 * then `STUDYMATE_*` environment variables.
 */
export function loadConfig(options: LoadConfigOptions = {}): LoadedConfig {
	const env = options.env ?? process.env
	const cwd = options.cwd ?? process.cwd()
	const home = options.home ?? homedir()

	let source: string | undefined
	if (env.STUDYMATE_CONFIG) {
		if (!existsSync(env.STUDYMATE_CONFIG)) {
			throw new InvalidConfigError(`STUDYMATE_CONFIG points to a missing file: ${env.STUDYMATE_CONFIG}`)
		}
		source = env.STUDYMATE_CONFIG
	} else {
		source = configPaths(cwd, home).find((path) => existsSync(path))
	}

	let config = defaultConfig(home)
	if (source) {
		let raw: unknown
		try {
			raw = JSON.parse(readFileSync(source, 'utf-8'))
		} catch (error) {
			throw new InvalidConfigError(`Could not read config file ${source}: ${errorMessage(error)}`)
		}
		config = mergeConfig(config, raw)
	}

	return { config: validateConfig(applyEnv(config, env)), source }
}

/** Maps the pipeline sections of a config onto corpus settings. */
export function toCorpusSettings(config: StudyMateConfig): CorpusSettings {
	return {
		chunking: config.chunking,
		index: {
			kind: config.index.kind,
			clustered: {
				clusters: config.index.clusters,
				nprobe: config.index.nprobe,
				minClusterSize: config.index.minClusterSize,
			},
		},
		retrieval: config.retrieval,
		generation: {
			maxChars: config.generation.maxChars,
			maxParseRetries: config.generation.maxParseRetries,
			maxRetries: config.generation.maxRetries,
			timeoutMs: config.generation.timeoutMs,
		},
		concurrency: config.ingestion.concurrency,
	}
}
