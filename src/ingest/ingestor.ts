import { extname } from 'node:path'
import { InvalidInputError, StudyMateError, toStudyMateError, UnsupportedFormatError } from '../errors.js'
import { NullLogger } from '../logger.js'
import type { CallOptions, Document, Logger } from '../types.js'
import { settleInSlices } from '../utils/batch.js'
import { throwIfCancelled } from '../utils/retry.js'
import { normalizeDocumentText, sha256 } from '../utils/text.js'
import { DEFAULT_EXTRACTORS, MIME_TYPES, type TextExtractor } from './extractors.js'

export interface IngestInput {
	/** File name or other label shown to the learner. */
	sourceName: string
	/** Required with `bytes`; defaults to `text/plain` with `text`. */
	mimeType?: string
	bytes?: Uint8Array
	/** Already-extracted text. Skips extraction. */
	text?: string
}

export interface IngestFailure {
	sourceName: string
	error: StudyMateError
}

export interface IngestManyResult {
	documents: Document[]
	failures: IngestFailure[]
}

export interface IngestorOptions {
	/** Largest accepted input in bytes (default: 10 MiB). */
	maxBytes?: number
	/** Documents extracted at once by `ingestMany` (default: 4). */
	concurrency?: number
	extractors?: Record<string, TextExtractor>
	logger?: Logger
}

const EXTENSIONS: Record<string, string> = {
	'.txt': MIME_TYPES.text,
	'.text': MIME_TYPES.text,
	'.md': MIME_TYPES.markdown,
	'.markdown': MIME_TYPES.markdown,
	'.pdf': MIME_TYPES.pdf,
	'.docx': MIME_TYPES.docx,
}

/** Guesses a MIME type from a file extension. */
export function mimeTypeFromPath(path: string): string | undefined {
	return EXTENSIONS[extname(path).toLowerCase()]
}

/** Lower-cases a MIME type and drops parameters such as `; charset=utf-8`. */
export function normalizeMimeType(mimeType: string): string {
	return mimeType.split(';')[0].trim().toLowerCase()
}

/** A document's id is derived from its content, so re-uploads map to the same id. */
export function documentIdFor(contentHash: string): string {
	return `doc_${contentHash.slice(0, 16)}`
}

/**
 * Converts uploaded files into normalized plain-text documents.
 */
export class DocumentIngestor {
	private readonly extractors: Map<string, TextExtractor>
	private readonly maxBytes: number
	private readonly concurrency: number
	private readonly logger: Logger

	constructor(options: IngestorOptions = {}) {
		this.extractors = new Map(Object.entries({ ...DEFAULT_EXTRACTORS, ...options.extractors }))
		this.maxBytes = options.maxBytes ?? 10 * 1024 * 1024
		this.concurrency = options.concurrency ?? 4
		this.logger = options.logger ?? new NullLogger()
	}

	registerExtractor(mimeType: string, extractor: TextExtractor): this {
		this.extractors.set(normalizeMimeType(mimeType), extractor)
		return this
	}

	supports(mimeType: string): boolean {
		return this.extractors.has(normalizeMimeType(mimeType))
	}

	async ingest(input: IngestInput, options: CallOptions = {}): Promise<Document> {
		throwIfCancelled(options.signal)
		const { rawText, mimeType } = await this.extract(input, options.signal)

		const text = normalizeDocumentText(rawText)
		if (text.length === 0) {
			throw new InvalidInputError(`No text content found in ${input.sourceName}`)
		}

		const contentHash = sha256(text)
		const document: Document = {
			id: documentIdFor(contentHash),
			sourceName: input.sourceName,
			mimeType,
			rawText: text,
			contentHash,
			ingestedAt: new Date(),
		}
		this.logger.debug('Extracted document', { sourceName: input.sourceName, mimeType, characters: text.length })
		return document
	}

	/** Ingests every input; a failing input is reported and the rest continue. */
	async ingestMany(inputs: readonly IngestInput[], options: CallOptions = {}): Promise<IngestManyResult> {
		const settled = await settleInSlices(inputs, this.concurrency, (input) => this.ingest(input, options))
		const result: IngestManyResult = { documents: [], failures: [] }

		for (const outcome of settled) {
			if (outcome.status === 'fulfilled') {
				result.documents.push(outcome.value)
				continue
			}
			const error = toStudyMateError(outcome.reason)
			if (error.code === 'CANCELLED') throw error
			this.logger.warn('Skipping document', { sourceName: outcome.item.sourceName, error: error.message })
			result.failures.push({ sourceName: outcome.item.sourceName, error })
		}
		return result
	}

	private async extract(input: IngestInput, signal?: AbortSignal): Promise<{ rawText: string; mimeType: string }> {
		if (input.text !== undefined) {
			const size = Buffer.byteLength(input.text, 'utf8')
			this.checkSize(input.sourceName, size)
			return { rawText: input.text, mimeType: normalizeMimeType(input.mimeType ?? MIME_TYPES.text) }
		}
		if (!input.bytes) {
			throw new InvalidInputError(`${input.sourceName} has neither bytes nor text`)
		}

		this.checkSize(input.sourceName, input.bytes.byteLength)
		const mimeType = normalizeMimeType(input.mimeType ?? mimeTypeFromPath(input.sourceName) ?? '')
		const extractor = this.extractors.get(mimeType)
		if (!extractor) {
			throw new UnsupportedFormatError(mimeType)
		}

		try {
			return { rawText: await extractor(input.bytes, signal), mimeType }
		} catch (error) {
			if (error instanceof StudyMateError) throw error
			throw new InvalidInputError(`Could not read ${input.sourceName} as ${mimeType}`, { cause: error })
		}
	}

	private checkSize(sourceName: string, size: number): void {
		if (size > this.maxBytes) {
			throw new InvalidInputError(`${sourceName} is ${size} bytes, larger than the ${this.maxBytes}-byte limit`)
		}
	}
}
