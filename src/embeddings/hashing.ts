import { InvalidConfigError } from '../errors.js'
import type { CallOptions, EmbeddingProvider, SimilarityMetric } from '../types.js'
import { throwIfCancelled } from '../utils/retry.js'
import { assertEmbeddable } from './validation.js'

const STOPWORDS = new Set([
	'a', 'an', 'and', 'are', 'as', 'at', 'be', 'by', 'can', 'do', 'does', 'for', 'from', 'how', 'in', 'into',
	'is', 'it', 'its', 'of', 'on', 'or', 'that', 'the', 'their', 'this', 'to', 'was', 'what', 'when', 'where',
	'which', 'who', 'why', 'with',
])

const TOKEN = /[\p{L}\p{N}]+/gu

export function tokenize(text: string): string[] {
	return (text.toLowerCase().match(TOKEN) ?? []).filter((token) => !STOPWORDS.has(token))
}

/** 32-bit DJB2-style string hash. */
export function hashToken(token: string): number {
	let hash = 0
	for (let i = 0; i < token.length; i++) {
		hash = (hash << 5) - hash + token.charCodeAt(i)
		hash |= 0
	}
	return hash >>> 0
}

/**
 * A local embedder based on the hashing trick: each content word is hashed into
 * one of `dimensions` buckets with a hash-derived sign, weighted by `1 + ln(tf)`,
 * and the vector is L2-normalized. It captures lexical overlap only, but it is
 * deterministic and needs no network, which makes it the offline and test default.
 */
export class HashingEmbeddingProvider implements EmbeddingProvider {
	readonly model: string
	readonly metric: SimilarityMetric = 'cosine'

	constructor(readonly dimensions = 256) {
		if (!Number.isInteger(dimensions) || dimensions < 2) {
			throw new InvalidConfigError(`dimensions must be an integer of at least 2, got ${dimensions}`, 'dimensions')
		}
		this.model = `hashing-v1-${dimensions}`
	}

	async embed(texts: string[], options: CallOptions = {}): Promise<number[][]> {
		throwIfCancelled(options.signal)
		assertEmbeddable(texts)
		return texts.map((text) => this.vectorize(text))
	}

	private vectorize(text: string): number[] {
		const counts = new Map<string, number>()
		for (const token of tokenize(text)) {
			counts.set(token, (counts.get(token) ?? 0) + 1)
		}

		const vector = new Array<number>(this.dimensions).fill(0)
		for (const [token, count] of counts) {
			const hash = hashToken(token)
			const sign = hash & 0x80000000 ? -1 : 1
			vector[hash % this.dimensions] += sign * (1 + Math.log(count))
		}

		const length = Math.sqrt(vector.reduce((sum, value) => sum + value * value, 0))
		return length === 0 ? vector : vector.map((value) => value / length)
	}
}
