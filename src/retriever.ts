import { InvalidInputError, StudyMateError } from './errors.js'
import { NullLogger } from './logger.js'
import type { CallOptions, Chunk, EmbeddingProvider, Logger, RetrievalResult, RetrievedPassage, VectorIndex } from './types.js'
import { dedupeKey } from './utils/text.js'
import { throwIfCancelled } from './utils/retry.js'

export interface RetrieveOptions extends CallOptions {
	/** Maximum number of passages (default: 5). */
	k?: number
	/** Passages scoring below this are dropped (default: 0.2). */
	minScore?: number
	/** Restrict results to these documents. */
	documentIds?: readonly string[]
}

export interface RetrieverDeps {
	embeddings: EmbeddingProvider
	index: VectorIndex
	/** Resolves an indexed chunk id to its chunk. */
	resolveChunk: (chunkId: string) => Chunk | undefined
	logger?: Logger
	defaults?: { k?: number; minScore?: number }
}

/**
 * Turns a question into a ranked list of supporting passages. The query is
 * embedded with the same provider the index was built with, searched, filtered
 * by score and de-duplicated. An empty result means nothing relevant was found.
 */
export class Retriever {
	private readonly logger: Logger

	constructor(private readonly deps: RetrieverDeps) {
		this.logger = deps.logger ?? new NullLogger()
	}

	async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		const k = options.k ?? this.deps.defaults?.k ?? 5
		const minScore = options.minScore ?? this.deps.defaults?.minScore ?? 0.2
		if (query.trim().length === 0) {
			throw new InvalidInputError('Query must not be empty')
		}
		if (!Number.isInteger(k) || k < 1) {
			throw new InvalidInputError(`k must be a positive integer, got ${k}`)
		}

		const [vector] = await this.deps.embeddings.embed([query], { signal: options.signal })
		throwIfCancelled(options.signal)
		if (this.deps.index.size === 0) return []

		const filter = options.documentIds ? new Set(options.documentIds) : undefined
		// over-fetch so that filtering and de-duplication can still fill k slots
		const fetch = filter ? this.deps.index.size : k * 2
		const hits = this.deps.index.search(vector, fetch)

		const passages: RetrievedPassage[] = []
		const seen = new Set<string>()
		for (const hit of hits) {
			if (hit.score < minScore) break
			const chunk = this.deps.resolveChunk(hit.chunkId)
			if (!chunk) {
				throw new StudyMateError(`Indexed chunk ${hit.chunkId} has no matching chunk`, 'INDEX_INCONSISTENT')
			}
			if (filter && !filter.has(chunk.documentId)) continue

			const key = dedupeKey(chunk.text)
			if (seen.has(key)) continue
			seen.add(key)

			passages.push({ chunkId: chunk.id, documentId: chunk.documentId, text: chunk.text, score: hit.score })
			if (passages.length === k) break
		}

		this.logger.debug('Retrieved passages', { hits: hits.length, kept: passages.length, k, minScore })
		return passages
	}
}
