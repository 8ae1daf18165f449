import OpenAI from 'openai'
import { EmbeddingServiceError } from '../errors.js'
import type { CallOptions, EmbeddingProvider, SimilarityMetric } from '../types.js'
import { mapOpenAIError } from '../utils/openai-errors.js'
import { assertEmbeddable } from './validation.js'

/** The slice of the OpenAI client this provider calls. */
export interface EmbeddingsClient {
	embeddings: {
		create(
			body: { model: string; input: string[]; dimensions?: number },
			options?: { signal?: AbortSignal },
		): Promise<{ data: Array<{ embedding: number[]; index: number }> }>
	}
}

export interface OpenAIEmbeddingOptions {
	client?: EmbeddingsClient
	/** Default: `text-embedding-3-small`. */
	model?: string
	/** Requested output size. Sent to the API only when set explicitly. */
	dimensions?: number
}

const DEFAULT_DIMENSIONS: Record<string, number> = {
	'text-embedding-3-small': 1536,
	'text-embedding-3-large': 3072,
	'text-embedding-ada-002': 1536,
}

/**
 * Embeds text with the OpenAI Embeddings API. One call per batch; vectors are
 * returned in input order. Retries and timeouts are left to the caller
 * (see `ResilientEmbeddingProvider`).
 */
export class OpenAIEmbeddingProvider implements EmbeddingProvider {
	readonly model: string
	readonly dimensions: number
	readonly metric: SimilarityMetric = 'cosine'
	private readonly client: EmbeddingsClient
	private readonly requestDimensions?: number

	constructor(options: OpenAIEmbeddingOptions = {}) {
		// retries are handled by withRetries, not the SDK
		this.client = options.client ?? new OpenAI({ maxRetries: 0 })
		this.model = options.model ?? 'text-embedding-3-small'
		this.requestDimensions = options.dimensions
		this.dimensions = options.dimensions ?? DEFAULT_DIMENSIONS[this.model] ?? 1536
	}

	async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
		if (texts.length === 0) return []
		assertEmbeddable(texts)

		try {
			const response = await this.client.embeddings.create(
				{
					model: this.model,
					input: texts.map((text) => text.replace(/\n/g, ' ')),
					...(this.requestDimensions !== undefined ? { dimensions: this.requestDimensions } : {}),
				},
				{ signal: options.signal },
			)
			if (response.data.length !== texts.length) {
				throw new EmbeddingServiceError(
					`Embeddings API returned ${response.data.length} vectors for ${texts.length} inputs`,
					{ retryable: false },
				)
			}
			return [...response.data].sort((a, b) => a.index - b.index).map((item) => item.embedding)
		} catch (error) {
			throw mapOpenAIError(error, 'Embeddings API', EmbeddingServiceError)
		}
	}
}
