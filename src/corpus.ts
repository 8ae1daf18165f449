import { type ChunkOptions, chunkText, resolveChunkOptions } from './chunker.js'
import {
	DimensionMismatchError,
	InvalidConfigError,
	StudyMateError,
	toStudyMateError,
} from './errors.js'
import { GenerationOrchestrator } from './generation/orchestrator.js'
import { DocumentIngestor, type IngestFailure, type IngestInput } from './ingest/ingestor.js'
import { NullLogger } from './logger.js'
import { type RetrieveOptions, Retriever } from './retriever.js'
import type {
	CallOptions,
	Chunk,
	ConversationTurn,
	CorpusState,
	CorpusStore,
	Difficulty,
	Document,
	EmbeddingProvider,
	EventBus,
	Flashcard,
	Generation,
	GenerativeModel,
	IndexEntry,
	LearnerProfile,
	Logger,
	QuizItem,
	RetrievalResult,
	StudyEvent,
	VectorIndex,
	VectorIndexKind,
} from './types.js'
import { settleInSlices, shuffle } from './utils/batch.js'
import { throwIfCancelled } from './utils/retry.js'
import { type ClusteredIndexOptions, createVectorIndex } from './vector-index/index.js'

type EmbeddedChunk = Chunk & { embedding: number[] }

export interface CorpusSettings {
	chunking?: ChunkOptions
	index?: { kind?: VectorIndexKind; clustered?: ClusteredIndexOptions }
	retrieval?: { k?: number; minScore?: number }
	generation?: {
		maxChars?: number
		maxParseRetries?: number
		maxRetries?: number
		timeoutMs?: number
		retryDelayMs?: number
	}
	/** Documents embedded at once during ingestion (default: 2). */
	concurrency?: number
}

export interface StudyCorpusDeps {
	embeddings: EmbeddingProvider
	/** Needed by the generation operations only. */
	model?: GenerativeModel
	store?: CorpusStore
	ingestor?: DocumentIngestor
	settings?: CorpusSettings
	logger?: Logger
	eventBus?: EventBus
	/** Source of randomness for shuffled flashcards (default: `Math.random`). */
	random?: () => number
}

export interface IngestReport {
	added: Array<{ documentId: string; sourceName: string; chunks: number }>
	/** Documents whose content is already in the corpus. They are not re-embedded. */
	skipped: Array<{ documentId: string; sourceName: string }>
	failed: IngestFailure[]
}

export interface DocumentSummary {
	id: string
	sourceName: string
	mimeType: string
	ingestedAt: Date
	characters: number
	chunks: number
}

export interface CorpusStats {
	corpusId: string
	documents: number
	chunks: number
	embeddingModel: string
	dimensions: number
	indexKind: VectorIndexKind
}

export interface QueryOptions extends RetrieveOptions {
	history?: readonly ConversationTurn[]
}

export interface ItemOptions extends RetrieveOptions {
	/** Number of questions or cards (default: 5). */
	count?: number
	difficulty?: Difficulty
}

export interface FlashcardOptions extends ItemOptions {
	/** Return the cards in random order. */
	shuffle?: boolean
}

/**
 * One learner's body of study material: its documents, their chunks and the vector
 * index over them. The corpus owns its index and hands it explicitly to the
 * retriever; nothing is shared between instances.
 *
 * Committed state changes only by whole-state swaps. Ingestion prepares new
 * document and chunk maps and a rebuilt index off to the side, so a cancelled or
 * failed ingestion leaves the corpus as it was.
 */
export class StudyCorpus {
	private documents = new Map<string, Document>()
	private chunks = new Map<string, EmbeddedChunk>()
	private readonly index: VectorIndex
	private readonly retriever: Retriever
	private readonly ingestor: DocumentIngestor
	private readonly chunking: Required<ChunkOptions>
	private readonly logger: Logger
	private orchestrator?: GenerationOrchestrator
	private writes: Promise<void> = Promise.resolve()

	constructor(
		public readonly id: string,
		private readonly deps: StudyCorpusDeps,
	) {
		if (id.trim().length === 0) {
			throw new InvalidConfigError('Corpus id must not be empty', 'corpus')
		}
		const settings = deps.settings ?? {}
		this.logger = deps.logger ?? new NullLogger()
		this.chunking = resolveChunkOptions(settings.chunking)
		this.ingestor = deps.ingestor ?? new DocumentIngestor({ logger: this.logger })
		this.index = createVectorIndex({
			kind: settings.index?.kind,
			clustered: settings.index?.clustered,
			metric: deps.embeddings.metric,
			dimensions: deps.embeddings.dimensions,
		})
		this.retriever = new Retriever({
			embeddings: deps.embeddings,
			index: this.index,
			resolveChunk: (chunkId) => this.chunks.get(chunkId),
			logger: this.logger,
			defaults: settings.retrieval,
		})
	}

	/** Opens a corpus, restoring persisted documents and vectors without re-embedding them. */
	static async open(id: string, deps: StudyCorpusDeps): Promise<StudyCorpus> {
		const corpus = new StudyCorpus(id, deps)
		const state = await deps.store?.load(id)
		if (state) corpus.restore(state)
		return corpus
	}

	get size(): { documents: number; chunks: number } {
		return { documents: this.documents.size, chunks: this.chunks.size }
	}

	// =================================================================================
	// Build time
	// =================================================================================

	/**
	 * Extracts, chunks and embeds new documents, then swaps them into the corpus.
	 * Failures are reported per document and never abort the batch; documents whose
	 * content is already indexed are skipped.
	 */
	ingest(inputs: readonly IngestInput[], options: CallOptions = {}): Promise<IngestReport> {
		return this.exclusive(() => this.ingestNow(inputs, options))
	}

	/** Removes a document and its chunks. Returns false when the id is unknown. */
	removeDocument(documentId: string): Promise<boolean> {
		return this.exclusive(() => this.removeNow(documentId))
	}

	/**
	 * Re-chunks and re-embeds every document, for example after the chunking settings
	 * changed. The current index keeps serving until the new one is complete.
	 */
	rebuild(options: CallOptions = {}): Promise<void> {
		return this.exclusive(() => this.rebuildNow(options))
	}

	private async ingestNow(inputs: readonly IngestInput[], options: CallOptions): Promise<IngestReport> {
		const { documents, failures } = await this.ingestor.ingestMany(inputs, options)
		const report: IngestReport = { added: [], skipped: [], failed: [...failures] }

		const pending: Document[] = []
		for (const document of documents) {
			if (this.documents.has(document.id) || pending.some((doc) => doc.id === document.id)) {
				report.skipped.push({ documentId: document.id, sourceName: document.sourceName })
				continue
			}
			pending.push(document)
		}

		const embedded = await this.embedDocuments(pending, options.signal)
		const accepted: Array<{ document: Document; chunks: EmbeddedChunk[] }> = []
		for (const outcome of embedded) {
			if (outcome.status === 'fulfilled') {
				accepted.push({ document: outcome.item, chunks: outcome.value })
				continue
			}
			const error = toStudyMateError(outcome.reason, { documentId: outcome.item.id, corpusId: this.id })
			if (error.code === 'CANCELLED') throw error
			report.failed.push({ sourceName: outcome.item.sourceName, error })
		}

		throwIfCancelled(options.signal)
		if (accepted.length > 0) {
			const documentsNext = new Map(this.documents)
			const chunksNext = new Map(this.chunks)
			for (const { document, chunks } of accepted) {
				documentsNext.set(document.id, document)
				for (const chunk of chunks) chunksNext.set(chunk.id, chunk)
				report.added.push({ documentId: document.id, sourceName: document.sourceName, chunks: chunks.length })
			}
			await this.commitAndPersist(documentsNext, chunksNext)
		}

		for (const added of report.added) {
			await this.emit({ type: 'document:ingested', payload: { corpusId: this.id, ...added } })
		}
		for (const skipped of report.skipped) {
			await this.emit({ type: 'document:skipped', payload: { corpusId: this.id, ...skipped } })
		}
		for (const failed of report.failed) {
			await this.emit({ type: 'document:failed', payload: { corpusId: this.id, ...failed } })
		}

		this.logger.info('Ingestion finished', {
			corpusId: this.id,
			added: report.added.length,
			skipped: report.skipped.length,
			failed: report.failed.length,
		})
		return report
	}

	private async removeNow(documentId: string): Promise<boolean> {
		if (!this.documents.has(documentId)) return false

		const documentsNext = new Map(this.documents)
		documentsNext.delete(documentId)
		const chunksNext = new Map([...this.chunks].filter(([, chunk]) => chunk.documentId !== documentId))
		await this.commitAndPersist(documentsNext, chunksNext)

		await this.emit({ type: 'document:removed', payload: { corpusId: this.id, documentId } })
		return true
	}

	private async rebuildNow(options: CallOptions): Promise<void> {
		const documents = [...this.documents.values()]
		const outcomes = await this.embedDocuments(documents, options.signal)

		const chunksNext = new Map<string, EmbeddedChunk>()
		for (const outcome of outcomes) {
			if (outcome.status === 'rejected') {
				throw toStudyMateError(outcome.reason, { documentId: outcome.item.id, corpusId: this.id })
			}
			for (const chunk of outcome.value) chunksNext.set(chunk.id, chunk)
		}

		throwIfCancelled(options.signal)
		await this.commitAndPersist(new Map(this.documents), chunksNext)
	}

	listDocuments(): DocumentSummary[] {
		const counts = new Map<string, number>()
		for (const chunk of this.chunks.values()) {
			counts.set(chunk.documentId, (counts.get(chunk.documentId) ?? 0) + 1)
		}
		return [...this.documents.values()].map((doc) => ({
			id: doc.id,
			sourceName: doc.sourceName,
			mimeType: doc.mimeType,
			ingestedAt: doc.ingestedAt,
			characters: doc.rawText.length,
			chunks: counts.get(doc.id) ?? 0,
		}))
	}

	getDocument(documentId: string): Document | undefined {
		return this.documents.get(documentId)
	}

	/** Chunks of one document in order. */
	getChunks(documentId: string): Chunk[] {
		return [...this.chunks.values()].filter((chunk) => chunk.documentId === documentId).sort((a, b) => a.index - b.index)
	}

	stats(): CorpusStats {
		return {
			corpusId: this.id,
			documents: this.documents.size,
			chunks: this.chunks.size,
			embeddingModel: this.deps.embeddings.model,
			dimensions: this.deps.embeddings.dimensions,
			indexKind: this.index.kind,
		}
	}

	// =================================================================================
	// Query time
	// =================================================================================

	async retrieve(query: string, options: RetrieveOptions = {}): Promise<RetrievalResult> {
		const passages = await this.retriever.retrieve(query, options)
		await this.emit({ type: 'query:retrieved', payload: { corpusId: this.id, query, hits: passages.length } })
		return passages
	}

	async ask(question: string, options: QueryOptions = {}): Promise<Generation<string>> {
		const passages = await this.retrieve(question, options)
		return this.generation().generate({
			mode: 'answer',
			query: question,
			passages,
			history: options.history,
			signal: options.signal,
		})
	}

	async quiz(topic: string, options: ItemOptions = {}): Promise<Generation<QuizItem[]>> {
		const passages = await this.retrieve(topic, options)
		return this.generation().generate({ mode: 'quiz', query: topic, passages, ...pickItemOptions(options) })
	}

	async flashcards(topic: string, options: FlashcardOptions = {}): Promise<Generation<Flashcard[]>> {
		const passages = await this.retrieve(topic, options)
		const generation = await this.generation().generate({
			mode: 'flashcards',
			query: topic,
			passages,
			...pickItemOptions(options),
		})
		if (!options.shuffle) return generation
		return { ...generation, value: shuffle(generation.value, this.deps.random) }
	}

	/** Summarizes a topic, or without one, the opening material of the corpus. */
	async summarize(topic?: string, options: ItemOptions = {}): Promise<Generation<string>> {
		const passages = topic ? await this.retrieve(topic, options) : this.leadingPassages(options.k)
		return this.generation().generate({
			mode: 'summarize',
			query: topic ?? 'Overview of all study material',
			passages,
			difficulty: options.difficulty,
			signal: options.signal,
		})
	}

	async studyPlan(goal: string, profile: LearnerProfile = {}, options: RetrieveOptions = {}): Promise<Generation<string>> {
		const passages = await this.retrieve(goal, options)
		return this.generation().generate({ mode: 'study-plan', query: goal, passages, profile, signal: options.signal })
	}

	// =================================================================================
	// Internals
	// =================================================================================

	private embedDocuments(documents: readonly Document[], signal?: AbortSignal) {
		return settleInSlices(documents, this.deps.settings?.concurrency ?? 2, async (document): Promise<EmbeddedChunk[]> => {
			const chunks = chunkText(document.id, document.rawText, this.chunking)
			const vectors = await this.deps.embeddings.embed(
				chunks.map((chunk) => chunk.text),
				{ signal },
			)
			this.logger.debug('Embedded document', { corpusId: this.id, documentId: document.id, chunks: chunks.length })
			return chunks.map((chunk, i) => ({ ...chunk, embedding: vectors[i] }))
		})
	}

	/** Rebuilds the index, then swaps in the new maps. A failed rebuild leaves everything unchanged. */
	private commit(documents: Map<string, Document>, chunks: Map<string, EmbeddedChunk>): number {
		const entries: IndexEntry[] = [...chunks.values()].map((chunk) => ({ chunkId: chunk.id, vector: chunk.embedding }))
		this.index.rebuild(entries)
		this.documents = documents
		this.chunks = chunks
		return entries.length
	}

	/** Runs state changes one at a time in call order. A failure reaches its own caller only. */
	private exclusive<T>(task: () => Promise<T>): Promise<T> {
		const run = this.writes.then(task)
		this.writes = run.then(
			() => undefined,
			() => undefined,
		)
		return run
	}

	/** Swaps in the new state and persists it; when persisting fails, the previous state is restored. */
	private async commitAndPersist(documents: Map<string, Document>, chunks: Map<string, EmbeddedChunk>): Promise<void> {
		const previous = { documents: this.documents, chunks: this.chunks }
		const entries = this.commit(documents, chunks)
		try {
			await this.persist()
		} catch (error) {
			this.commit(previous.documents, previous.chunks)
			throw error
		}
		await this.emit({
			type: 'index:rebuilt',
			payload: { corpusId: this.id, entries, dimensions: this.index.dimensions },
		})
	}

	private restore(state: CorpusState): void {
		const { embeddings } = this.deps
		if (state.embedding.dimensions !== embeddings.dimensions) {
			throw new DimensionMismatchError(
				embeddings.dimensions,
				state.embedding.dimensions,
				`Corpus ${this.id} was embedded with ${state.embedding.model} (${state.embedding.dimensions} dimensions); the configured model ${embeddings.model} has ${embeddings.dimensions}`,
			)
		}
		if (state.embedding.model !== embeddings.model || state.embedding.metric !== embeddings.metric) {
			throw new DimensionMismatchError(
				embeddings.dimensions,
				state.embedding.dimensions,
				`Corpus ${this.id} was embedded with ${state.embedding.model} (${state.embedding.metric}); re-ingest it to use ${embeddings.model} (${embeddings.metric})`,
			)
		}

		const documents = new Map(state.documents.map((doc) => [doc.id, doc]))
		const chunks = new Map<string, EmbeddedChunk>()
		for (const chunk of state.chunks) {
			const { embedding } = chunk
			if (!embedding || !documents.has(chunk.documentId)) {
				throw new StudyMateError(`Stored chunk ${chunk.id} has no embedding or no document`, 'INDEX_INCONSISTENT', {
					corpusId: this.id,
				})
			}
			chunks.set(chunk.id, { ...chunk, embedding })
		}
		this.commit(documents, chunks)
		this.logger.info('Corpus restored', { corpusId: this.id, documents: documents.size, chunks: chunks.size })
	}

	private async persist(): Promise<void> {
		const { store } = this.deps
		if (!store) return
		await store.save({
			corpusId: this.id,
			embedding: {
				model: this.deps.embeddings.model,
				dimensions: this.deps.embeddings.dimensions,
				metric: this.deps.embeddings.metric,
			},
			documents: [...this.documents.values()],
			chunks: [...this.chunks.values()],
			updatedAt: new Date(),
		})
	}

	private leadingPassages(k = this.deps.settings?.retrieval?.k ?? 5): RetrievalResult {
		return [...this.documents.keys()]
			.flatMap((documentId) => this.getChunks(documentId))
			.slice(0, k)
			.map((chunk) => ({ chunkId: chunk.id, documentId: chunk.documentId, text: chunk.text, score: 1 }))
	}

	private generation(): GenerationOrchestrator {
		if (!this.orchestrator) {
			const { model } = this.deps
			if (!model) {
				throw new InvalidConfigError('No generative model is configured for this corpus', 'model')
			}
			this.orchestrator = new GenerationOrchestrator({
				model,
				...this.deps.settings?.generation,
				logger: this.logger,
				eventBus: this.deps.eventBus,
			})
		}
		return this.orchestrator
	}

	private async emit(event: StudyEvent): Promise<void> {
		await this.deps.eventBus?.emit(event)
	}
}

function pickItemOptions(options: ItemOptions) {
	return { count: options.count, difficulty: options.difficulty, signal: options.signal }
}
