import { DimensionMismatchError, EmbeddingServiceError, errorMessage } from '../errors.js'
import { NullLogger } from '../logger.js'
import type { CallOptions, EmbeddingProvider, EventBus, Logger, SimilarityMetric } from '../types.js'
import { settleInSlices, toBatches } from '../utils/batch.js'
import { withRetries } from '../utils/retry.js'
import { assertEmbeddable } from './validation.js'

export interface ResilientEmbeddingOptions {
	/** Texts per request (default: 64). */
	batchSize?: number
	/** Requests in flight at once (default: 4). */
	concurrency?: number
	/** Per-request timeout (default: 30000). */
	timeoutMs?: number
	/** Retries per request for retryable failures (default: 2). */
	maxRetries?: number
	retryDelayMs?: number
	logger?: Logger
	eventBus?: EventBus
}

/**
 * Wraps an embedding provider with batching, bounded parallelism, per-request
 * timeouts and retries. Output order always matches input order, and every
 * returned vector is checked against the declared dimensionality.
 */
export class ResilientEmbeddingProvider implements EmbeddingProvider {
	private readonly options: Required<Omit<ResilientEmbeddingOptions, 'logger' | 'eventBus'>>
	private readonly logger: Logger

	constructor(
		private readonly inner: EmbeddingProvider,
		private readonly settings: ResilientEmbeddingOptions = {},
	) {
		this.options = {
			batchSize: settings.batchSize ?? 64,
			concurrency: settings.concurrency ?? 4,
			timeoutMs: settings.timeoutMs ?? 30_000,
			maxRetries: settings.maxRetries ?? 2,
			retryDelayMs: settings.retryDelayMs ?? 250,
		}
		this.logger = settings.logger ?? new NullLogger()
	}

	get model(): string {
		return this.inner.model
	}

	get dimensions(): number {
		return this.inner.dimensions
	}

	get metric(): SimilarityMetric {
		return this.inner.metric
	}

	async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
		if (texts.length === 0) return []
		assertEmbeddable(texts)

		const batches = toBatches(texts, this.options.batchSize)
		this.logger.debug('Embedding texts', { model: this.model, texts: texts.length, batches: batches.length })

		const settled = await settleInSlices(batches, this.options.concurrency, (batch) =>
			withRetries((signal) => this.inner.embed(batch, { signal }), {
				label: `Embedding batch (${this.model})`,
				maxRetries: this.options.maxRetries,
				retryDelayMs: this.options.retryDelayMs,
				timeoutMs: this.options.timeoutMs,
				onTimeout: (ms) => new EmbeddingServiceError(`Embedding request timed out after ${ms}ms`),
				signal: options.signal,
				logger: this.logger,
				onRetry: (attempt, error) =>
					this.settings.eventBus?.emit({
						type: 'service:retry',
						payload: { label: `embed:${this.model}`, attempt, error: errorMessage(error) },
					}),
			}),
		)

		const vectors: number[][] = []
		for (const result of settled) {
			if (result.status === 'rejected') throw result.reason
			if (result.value.length !== result.item.length) {
				throw new EmbeddingServiceError(
					`Embedding provider returned ${result.value.length} vectors for ${result.item.length} texts`,
					{ retryable: false },
				)
			}
			vectors.push(...result.value)
		}

		for (const vector of vectors) {
			if (vector.length !== this.dimensions) {
				throw new DimensionMismatchError(
					this.dimensions,
					vector.length,
					`Embedding model ${this.model} returned a ${vector.length}-dimensional vector, expected ${this.dimensions}`,
				)
			}
		}
		return vectors
	}
}
