import type { SimilarityMetric } from '../types.js'

export function dot(a: ArrayLike<number>, b: ArrayLike<number>): number {
	let sum = 0
	for (let i = 0; i < a.length; i++) sum += a[i] * b[i]
	return sum
}

export function norm(a: ArrayLike<number>): number {
	return Math.sqrt(dot(a, a))
}

/**
 * Calculates cosine similarity between two vectors. Zero vectors score 0;
 * the result is clamped to [-1, 1] against floating point drift.
 */
export function cosineSimilarity(a: ArrayLike<number>, b: ArrayLike<number>, normA = norm(a), normB = norm(b)): number {
	if (normA === 0 || normB === 0) return 0
	const score = dot(a, b) / (normA * normB)
	return Math.max(-1, Math.min(1, score))
}

export function l2Distance(a: ArrayLike<number>, b: ArrayLike<number>): number {
	let sum = 0
	for (let i = 0; i < a.length; i++) {
		const d = a[i] - b[i]
		sum += d * d
	}
	return Math.sqrt(sum)
}

/** Maps a metric onto a "higher is more similar" score. */
export function similarity(metric: SimilarityMetric, a: ArrayLike<number>, b: ArrayLike<number>): number {
	return metric === 'cosine' ? cosineSimilarity(a, b) : 1 / (1 + l2Distance(a, b))
}

/** The closed range every score of a metric falls in. */
export function scoreRange(metric: SimilarityMetric): [number, number] {
	return metric === 'cosine' ? [-1, 1] : [0, 1]
}
