import type { StudyMateError } from './errors.js'

// =================================================================================
// Corpus Data Model
// =================================================================================

/** A piece of study material after text extraction and normalization. */
export interface Document {
	id: string
	sourceName: string
	mimeType: string
	/** Normalized plain text. Chunk offsets index into this string. */
	rawText: string
	/** SHA-256 hex digest of `rawText`, used to skip unchanged uploads. */
	contentHash: string
	ingestedAt: Date
}

/** A bounded span of a document's text, the atomic retrieval unit. */
export interface Chunk {
	id: string
	/** Non-owning back-reference to the source document. */
	documentId: string
	/** Position of the chunk within its document (0-based). */
	index: number
	text: string
	startOffset: number
	endOffset: number
	/** Absent until the chunk has been embedded. */
	embedding?: number[]
}

/** The similarity measure an index is created with. */
export type SimilarityMetric = 'cosine' | 'l2'

/** One entry of a ranked retrieval, descending by score. */
export interface RetrievedPassage {
	chunkId: string
	documentId: string
	text: string
	score: number
}

export type RetrievalResult = RetrievedPassage[]

/** A prior conversation turn supplied by the caller. */
export interface ConversationTurn {
	role: 'user' | 'assistant'
	content: string
}

/** The bounded prompt handed to the generative model. */
export interface PromptContext {
	query: string
	directive: string
	/** Passages that fit in the budget, in the order they were included. */
	passages: RetrievedPassage[]
	history: ConversationTurn[]
	/** The fully rendered prompt. Never longer than `maxChars`. */
	text: string
	maxChars: number
	/** False when no supporting material was found for the query. */
	supported: boolean
}

// =================================================================================
// External Service Boundaries
// =================================================================================

/** Options accepted by every call that may suspend on network I/O. */
export interface CallOptions {
	signal?: AbortSignal
}

/** Maps text to fixed-dimension vectors. */
export interface EmbeddingProvider {
	readonly model: string
	readonly dimensions: number
	readonly metric: SimilarityMetric
	/** Returns one vector per input text, in input order. */
	embed(texts: string[], options?: CallOptions): Promise<number[][]>
}

/** An opaque text-completion service. */
export interface GenerativeModel {
	readonly model: string
	complete(prompt: string, options?: CallOptions): Promise<string>
}

// =================================================================================
// Vector Index
// =================================================================================

export interface SearchHit {
	chunkId: string
	score: number
}

export interface IndexEntry {
	chunkId: string
	vector: number[]
}

export type VectorIndexKind = 'exact' | 'clustered'

/** A serializable copy of an index's contents. */
export interface IndexSnapshot {
	kind: VectorIndexKind
	metric: SimilarityMetric
	dimensions?: number
	/** Entries in insertion order. */
	entries: IndexEntry[]
}

export interface VectorIndex {
	readonly kind: VectorIndexKind
	readonly metric: SimilarityMetric
	readonly dimensions: number | undefined
	readonly size: number
	add(chunkId: string, vector: number[]): void
	remove(chunkId: string): boolean
	has(chunkId: string): boolean
	search(query: number[], k: number): SearchHit[]
	/** Replaces the whole contents at once. Readers never see a partial build. */
	rebuild(entries: Iterable<IndexEntry>): void
	toSnapshot(): IndexSnapshot
}

// =================================================================================
// Generation
// =================================================================================

export type TaskMode = 'answer' | 'quiz' | 'summarize' | 'flashcards' | 'study-plan'

export type Difficulty = 'basic' | 'intermediate' | 'advanced'

export interface QuizItem {
	question: string
	options: string[]
	/** Always one of `options`. */
	correctAnswer: string
}

export interface Flashcard {
	term: string
	definition: string
}

/** Optional details that personalize a study plan. */
export interface LearnerProfile {
	name?: string
	course?: string
	level?: Difficulty
	goals?: string
	learningStyle?: 'theory' | 'hands-on' | 'mixed'
	duration?: string
	dailyTime?: string
}

/** The post-processed value each task mode produces. */
export interface GenerationValueMap {
	answer: string
	summarize: string
	'study-plan': string
	quiz: QuizItem[]
	flashcards: Flashcard[]
}

/** Tagged result of parsing a model response. */
export type ParseOutcome<T> = { kind: 'parsed'; value: T } | { kind: 'unparseable'; raw: string; reason: string }

export interface Generation<T> {
	mode: TaskMode
	value: T
	/** Number of model dispatches it took, including retries with a stricter directive. */
	attempts: number
	supported: boolean
	passages: RetrievedPassage[]
}

// =================================================================================
// Persistence
// =================================================================================

/** Everything needed to reopen a corpus without re-embedding it. */
export interface CorpusState {
	corpusId: string
	embedding: {
		model: string
		dimensions: number
		metric: SimilarityMetric
	}
	documents: Document[]
	/** Chunks with their embeddings. */
	chunks: Chunk[]
	updatedAt: Date
}

export interface CorpusStore {
	load(corpusId: string): Promise<CorpusState | undefined>
	save(state: CorpusState): Promise<void>
	delete(corpusId: string): Promise<boolean>
}

// =================================================================================
// Runtime & Extensibility Interfaces
// =================================================================================

/** Interface for a pluggable logger. */
export interface Logger {
	debug: (message: string, meta?: Record<string, unknown>) => void
	info: (message: string, meta?: Record<string, unknown>) => void
	warn: (message: string, meta?: Record<string, unknown>) => void
	error: (message: string, meta?: Record<string, unknown>) => void
}

/** Structured events for tracing ingestion and queries. */
export type StudyEvent =
	| { type: 'document:ingested'; payload: { corpusId: string; documentId: string; sourceName: string; chunks: number } }
	| { type: 'document:skipped'; payload: { corpusId: string; documentId: string; sourceName: string } }
	| { type: 'document:failed'; payload: { corpusId: string; sourceName: string; error: StudyMateError } }
	| { type: 'document:removed'; payload: { corpusId: string; documentId: string } }
	| { type: 'index:rebuilt'; payload: { corpusId: string; entries: number; dimensions?: number } }
	| { type: 'query:retrieved'; payload: { corpusId: string; query: string; hits: number } }
	| { type: 'service:retry'; payload: { label: string; attempt: number; error: string } }
	| { type: 'generation:retry'; payload: { mode: TaskMode; attempt: number; reason: string } }
	| { type: 'generation:finish'; payload: { mode: TaskMode; attempts: number; supported: boolean } }

/** Interface for a pluggable event bus. */
export interface EventBus {
	emit: (event: StudyEvent) => void | Promise<void>
}

/** Interface for a pluggable serializer. */
export interface Serializer {
	serialize: (data: unknown) => string
	deserialize: (text: string) => unknown
}
