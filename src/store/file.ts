import { randomUUID } from 'node:crypto'
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises'
import { join } from 'node:path'
import { InvalidInputError } from '../errors.js'
import { SuperJsonSerializer } from '../serializer.js'
import type { CorpusState, CorpusStore, Serializer } from '../types.js'

export interface FileCorpusStoreOptions {
	/** Directory holding one file per corpus. Created on first save. */
	directory: string
	/** Must round-trip `Date` values (default: `SuperJsonSerializer`). */
	serializer?: Serializer
}

function isRecord(value: unknown): value is Record<string, unknown> {
	return typeof value === 'object' && value !== null
}

function isDocument(value: unknown): boolean {
	return (
		isRecord(value) &&
		typeof value.id === 'string' &&
		typeof value.sourceName === 'string' &&
		typeof value.mimeType === 'string' &&
		typeof value.rawText === 'string' &&
		typeof value.contentHash === 'string' &&
		value.ingestedAt instanceof Date
	)
}

function isEmbedding(value: unknown): boolean {
	return Array.isArray(value) && value.every((item) => typeof item === 'number' && Number.isFinite(item))
}

function isChunk(value: unknown): boolean {
	return (
		isRecord(value) &&
		typeof value.id === 'string' &&
		typeof value.documentId === 'string' &&
		Number.isInteger(value.index) &&
		typeof value.text === 'string' &&
		Number.isInteger(value.startOffset) &&
		Number.isInteger(value.endOffset) &&
		(value.embedding === undefined || isEmbedding(value.embedding))
	)
}

function isCorpusState(value: unknown): value is CorpusState {
	if (!isRecord(value) || !isRecord(value.embedding)) return false
	const embedding = value.embedding
	return (
		typeof value.corpusId === 'string' &&
		typeof embedding.model === 'string' &&
		typeof embedding.dimensions === 'number' &&
		(embedding.metric === 'cosine' || embedding.metric === 'l2') &&
		value.updatedAt instanceof Date &&
		Array.isArray(value.documents) &&
		value.documents.every(isDocument) &&
		Array.isArray(value.chunks) &&
		value.chunks.every(isChunk)
	)
}

/** Stores each corpus as one serialized file, written through a temporary file and a rename. */
export class FileCorpusStore implements CorpusStore {
	private readonly serializer: Serializer

	constructor(private readonly options: FileCorpusStoreOptions) {
		this.serializer = options.serializer ?? new SuperJsonSerializer()
	}

	pathFor(corpusId: string): string {
		return join(this.options.directory, `${encodeURIComponent(corpusId)}.json`)
	}

	async load(corpusId: string): Promise<CorpusState | undefined> {
		let text: string
		try {
			text = await readFile(this.pathFor(corpusId), 'utf-8')
		} catch (error) {
			if (isRecord(error) && error.code === 'ENOENT') return undefined
			throw error
		}

		const state = this.serializer.deserialize(text)
		if (!isCorpusState(state)) {
			throw new InvalidInputError(`Corpus file ${this.pathFor(corpusId)} is not a valid corpus`, { corpusId })
		}
		return state
	}

	async save(state: CorpusState): Promise<void> {
		await mkdir(this.options.directory, { recursive: true })
		const target = this.pathFor(state.corpusId)
		const temporary = `${target}.${randomUUID()}.tmp`
		try {
			await writeFile(temporary, this.serializer.serialize(state), 'utf-8')
			await rename(temporary, target)
		} catch (error) {
			await rm(temporary, { force: true })
			throw error
		}
	}

	async delete(corpusId: string): Promise<boolean> {
		try {
			await rm(this.pathFor(corpusId))
			return true
		} catch (error) {
			if (isRecord(error) && error.code === 'ENOENT') return false
			throw error
		}
	}
}
