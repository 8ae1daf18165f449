import Database from 'better-sqlite3'
import { InvalidInputError } from '../errors.js'
import type { Chunk, CorpusState, CorpusStore, Document, SimilarityMetric } from '../types.js'

export interface SqliteCorpusStoreOptions {
	/**
	 * Path to the SQLite database file. Use ':memory:' for in-memory database.
	 */
	databasePath: string
	/**
	 * Whether to enable WAL mode for better concurrent access
	 */
	walMode?: boolean
}

interface CorpusRow {
	corpus_id: string
	embedding_model: string
	dimensions: number
	metric: string
	updated_at: string
}

interface DocumentRow {
	id: string
	source_name: string
	mime_type: string
	raw_text: string
	content_hash: string
	ingested_at: string
}

interface ChunkRow {
	id: string
	document_id: string
	position: number
	text: string
	start_offset: number
	end_offset: number
	embedding: string | null
}

function toMetric(value: string): SimilarityMetric {
	if (value === 'cosine' || value === 'l2') return value
	throw new InvalidInputError(`Stored corpus has unknown similarity metric "${value}"`)
}

/**
 * SQLite-backed corpus store. Documents, chunks and embeddings live in three
 * tables keyed by corpus id; `save` replaces a corpus in a single transaction.
 */
export class SqliteCorpusStore implements CorpusStore {
	private db: Database.Database

	constructor(options: SqliteCorpusStoreOptions) {
		this.db = new Database(options.databasePath)

		if (options.walMode !== false) {
			this.db.pragma('journal_mode = WAL')
		}
		this.db.pragma('foreign_keys = ON')

		this.initializeTables()
	}

	private initializeTables(): void {
		this.db.exec(`
			CREATE TABLE IF NOT EXISTS corpora (
				corpus_id TEXT PRIMARY KEY,
				embedding_model TEXT NOT NULL,
				dimensions INTEGER NOT NULL,
				metric TEXT NOT NULL,
				updated_at TEXT NOT NULL
			)
		`)

		this.db.exec(`
			CREATE TABLE IF NOT EXISTS documents (
				corpus_id TEXT NOT NULL REFERENCES corpora(corpus_id) ON DELETE CASCADE,
				id TEXT NOT NULL,
				source_name TEXT NOT NULL,
				mime_type TEXT NOT NULL,
				raw_text TEXT NOT NULL,
				content_hash TEXT NOT NULL,
				ingested_at TEXT NOT NULL,
				PRIMARY KEY (corpus_id, id)
			)
		`)

		this.db.exec(`
			CREATE TABLE IF NOT EXISTS chunks (
				corpus_id TEXT NOT NULL REFERENCES corpora(corpus_id) ON DELETE CASCADE,
				id TEXT NOT NULL,
				document_id TEXT NOT NULL,
				position INTEGER NOT NULL,
				text TEXT NOT NULL,
				start_offset INTEGER NOT NULL,
				end_offset INTEGER NOT NULL,
				embedding TEXT,
				PRIMARY KEY (corpus_id, id)
			)
		`)

		this.db.exec(`
			CREATE INDEX IF NOT EXISTS idx_chunks_document ON chunks(corpus_id, document_id, position);
			CREATE INDEX IF NOT EXISTS idx_documents_hash ON documents(corpus_id, content_hash);
		`)
	}

	async load(corpusId: string): Promise<CorpusState | undefined> {
		const corpus = this.db
			.prepare<[string], CorpusRow>('SELECT * FROM corpora WHERE corpus_id = ?')
			.get(corpusId)
		if (!corpus) return undefined

		const documents = this.db
			.prepare<[string], DocumentRow>('SELECT * FROM documents WHERE corpus_id = ? ORDER BY ingested_at, id')
			.all(corpusId)
		const chunks = this.db
			.prepare<[string], ChunkRow>('SELECT * FROM chunks WHERE corpus_id = ? ORDER BY document_id, position')
			.all(corpusId)

		return {
			corpusId,
			embedding: {
				model: corpus.embedding_model,
				dimensions: corpus.dimensions,
				metric: toMetric(corpus.metric),
			},
			documents: documents.map(
				(row): Document => ({
					id: row.id,
					sourceName: row.source_name,
					mimeType: row.mime_type,
					rawText: row.raw_text,
					contentHash: row.content_hash,
					ingestedAt: new Date(row.ingested_at),
				}),
			),
			chunks: chunks.map((row): Chunk => {
				const chunk: Chunk = {
					id: row.id,
					documentId: row.document_id,
					index: row.position,
					text: row.text,
					startOffset: row.start_offset,
					endOffset: row.end_offset,
				}
				if (row.embedding !== null) chunk.embedding = parseEmbedding(row.embedding, row.id)
				return chunk
			}),
			updatedAt: new Date(corpus.updated_at),
		}
	}

	async save(state: CorpusState): Promise<void> {
		const upsertCorpus = this.db.prepare(`
			INSERT INTO corpora (corpus_id, embedding_model, dimensions, metric, updated_at)
			VALUES (?, ?, ?, ?, ?)
			ON CONFLICT(corpus_id) DO UPDATE SET
				embedding_model = excluded.embedding_model,
				dimensions = excluded.dimensions,
				metric = excluded.metric,
				updated_at = excluded.updated_at
		`)
		const clearDocuments = this.db.prepare('DELETE FROM documents WHERE corpus_id = ?')
		const clearChunks = this.db.prepare('DELETE FROM chunks WHERE corpus_id = ?')
		const insertDocument = this.db.prepare(`
			INSERT INTO documents (corpus_id, id, source_name, mime_type, raw_text, content_hash, ingested_at)
			VALUES (?, ?, ?, ?, ?, ?, ?)
		`)
		const insertChunk = this.db.prepare(`
			INSERT INTO chunks (corpus_id, id, document_id, position, text, start_offset, end_offset, embedding)
			VALUES (?, ?, ?, ?, ?, ?, ?, ?)
		`)

		const write = this.db.transaction((corpus: CorpusState) => {
			const { corpusId, embedding } = corpus
			upsertCorpus.run(corpusId, embedding.model, embedding.dimensions, embedding.metric, corpus.updatedAt.toISOString())
			clearChunks.run(corpusId)
			clearDocuments.run(corpusId)
			for (const doc of corpus.documents) {
				insertDocument.run(
					corpusId,
					doc.id,
					doc.sourceName,
					doc.mimeType,
					doc.rawText,
					doc.contentHash,
					doc.ingestedAt.toISOString(),
				)
			}
			for (const chunk of corpus.chunks) {
				insertChunk.run(
					corpusId,
					chunk.id,
					chunk.documentId,
					chunk.index,
					chunk.text,
					chunk.startOffset,
					chunk.endOffset,
					chunk.embedding ? JSON.stringify(chunk.embedding) : null,
				)
			}
		})
		write(state)
	}

	async delete(corpusId: string): Promise<boolean> {
		const result = this.db.prepare('DELETE FROM corpora WHERE corpus_id = ?').run(corpusId)
		return result.changes > 0
	}

	/**
	 * Close the database connection.
	 */
	close(): void {
		this.db.close()
	}

	/**
	 * Get database statistics.
	 */
	getStats(): { corpora: number; documents: number; chunks: number } {
		const count = (table: 'corpora' | 'documents' | 'chunks') =>
			this.db.prepare<[], { count: number }>(`SELECT COUNT(*) as count FROM ${table}`).get()?.count ?? 0

		return {
			corpora: count('corpora'),
			documents: count('documents'),
			chunks: count('chunks'),
		}
	}
}

function parseEmbedding(value: string, chunkId: string): number[] {
	const parsed: unknown = JSON.parse(value)
	if (!Array.isArray(parsed) || !parsed.every((item): item is number => typeof item === 'number')) {
		throw new InvalidInputError(`Stored embedding for chunk ${chunkId} is not a numeric array`)
	}
	return parsed
}
