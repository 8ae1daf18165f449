import { describe, expect, it } from 'vitest'
import { DimensionMismatchError, InvalidConfigError, InvalidInputError } from '../errors.js'
import type { IndexEntry } from '../types.js'
import { ClusteredVectorIndex, createVectorIndex, ExactVectorIndex, fromSnapshot } from './index.js'
import { cosineSimilarity, l2Distance } from './metrics.js'

/** Three well-separated groups of 20 vectors each, inserted group by group. */
function groupedEntries(): IndexEntry[] {
	const entries: IndexEntry[] = []
	for (let group = 0; group < 3; group++) {
		for (let j = 0; j < 20; j++) {
			const vector = [0, 0, 0]
			vector[group] = 1
			vector[(group + 1) % 3] = j / 100
			entries.push({ chunkId: `g${group}-${j}`, vector })
		}
	}
	return entries
}

describe('metrics', () => {
	it('should compute cosine similarity and treat zero vectors as unrelated', () => {
		expect(cosineSimilarity([1, 0], [1, 0])).toBeCloseTo(1)
		expect(cosineSimilarity([1, 0], [0, 1])).toBeCloseTo(0)
		expect(cosineSimilarity([1, 0], [-1, 0])).toBeCloseTo(-1)
		expect(cosineSimilarity([0, 0], [1, 0])).toBe(0)
	})

	it('should compute euclidean distance', () => {
		expect(l2Distance([0, 0], [3, 4])).toBe(5)
	})
})

describe('ExactVectorIndex', () => {
	it('should establish dimensions from the first vector', () => {
		const index = new ExactVectorIndex('cosine')
		expect(index.dimensions).toBeUndefined()
		index.add('a', [1, 0, 0])
		expect(index.dimensions).toBe(3)
		expect(index.size).toBe(1)
	})

	it('should reject vectors of the wrong dimensionality', () => {
		const index = new ExactVectorIndex('cosine', 3)
		expect(() => index.add('a', [1, 0])).toThrow(DimensionMismatchError)
		index.add('a', [1, 0, 0])
		expect(() => index.search([1, 0], 1)).toThrow(DimensionMismatchError)
	})

	it('should reject empty and non-finite vectors', () => {
		const index = new ExactVectorIndex('cosine')
		expect(() => index.add('a', [])).toThrow(InvalidInputError)
		expect(() => index.add('a', [1, Number.NaN])).toThrow(InvalidInputError)
		expect(() => new ExactVectorIndex('cosine', 0)).toThrow(InvalidInputError)
	})

	it('should return hits in descending score order, at most k', () => {
		const index = new ExactVectorIndex('cosine')
		index.add('east', [1, 0])
		index.add('north', [0, 1])
		index.add('northeast', [1, 1])
		index.add('west', [-1, 0])

		const hits = index.search([1, 0.1], 3)
		expect(hits.map((h) => h.chunkId)).toEqual(['east', 'northeast', 'north'])
		for (let i = 1; i < hits.length; i++) {
			expect(hits[i - 1].score).toBeGreaterThanOrEqual(hits[i].score)
		}
		for (const hit of hits) {
			expect(hit.score).toBeGreaterThanOrEqual(-1)
			expect(hit.score).toBeLessThanOrEqual(1)
		}
	})

	it('should return nothing for k <= 0 or an empty index', () => {
		const index = new ExactVectorIndex('cosine')
		expect(index.search([1, 0], 3)).toEqual([])
		index.add('a', [1, 0])
		expect(index.search([1, 0], 0)).toEqual([])
	})

	it('should order equal scores by insertion', () => {
		const index = new ExactVectorIndex('cosine')
		index.add('second', [1, 0])
		index.add('first', [2, 0])
		index.add('third', [3, 0])
		expect(index.search([1, 0], 3).map((h) => h.chunkId)).toEqual(['second', 'first', 'third'])
	})

	it('should keep the insertion position when an id is re-added', () => {
		const index = new ExactVectorIndex('cosine')
		index.add('a', [0, 1])
		index.add('b', [1, 0])
		index.add('a', [1, 0])
		expect(index.size).toBe(2)
		expect(index.search([1, 0], 2).map((h) => h.chunkId)).toEqual(['a', 'b'])
	})

	it('should not be affected by later mutation of an added vector', () => {
		const index = new ExactVectorIndex('cosine')
		const vector = [1, 0]
		index.add('a', vector)
		vector[0] = -1
		expect(index.search([1, 0], 1)[0].score).toBeCloseTo(1)
	})

	it('should remove entries', () => {
		const index = new ExactVectorIndex('cosine')
		index.add('a', [1, 0])
		expect(index.remove('a')).toBe(true)
		expect(index.remove('a')).toBe(false)
		expect(index.has('a')).toBe(false)
	})

	it('should score l2 as 1 / (1 + distance)', () => {
		const index = createVectorIndex({ metric: 'l2' })
		index.add('origin', [0, 0])
		index.add('far', [3, 4])
		const hits = index.search([0, 0], 2)
		expect(hits).toEqual([
			{ chunkId: 'origin', score: 1 },
			{ chunkId: 'far', score: 1 / 6 },
		])
	})

	it('should replace the contents on rebuild', () => {
		const index = new ExactVectorIndex('cosine')
		index.add('old', [1, 0])
		index.rebuild([
			{ chunkId: 'x', vector: [0, 1] },
			{ chunkId: 'y', vector: [1, 0] },
		])
		expect(index.has('old')).toBe(false)
		expect(index.size).toBe(2)
		expect(index.search([1, 0], 1)).toEqual([{ chunkId: 'y', score: 1 }])
	})

	it('should leave the previous contents in place when a rebuild fails', () => {
		const index = new ExactVectorIndex('cosine')
		index.add('old', [1, 0])
		expect(() =>
			index.rebuild([
				{ chunkId: 'x', vector: [0, 1, 0] },
				{ chunkId: 'y', vector: [1, 0] },
			]),
		).toThrow(DimensionMismatchError)
		expect(index.size).toBe(1)
		expect(index.dimensions).toBe(2)
		expect(index.search([1, 0], 5)).toEqual([{ chunkId: 'old', score: 1 }])
	})

	it('should round-trip through a snapshot', () => {
		const index = createVectorIndex({ metric: 'cosine' })
		index.add('b', [0, 1])
		index.add('a', [1, 0])
		const snapshot = index.toSnapshot()
		expect(snapshot).toEqual({
			kind: 'exact',
			metric: 'cosine',
			dimensions: 2,
			entries: [
				{ chunkId: 'b', vector: [0, 1] },
				{ chunkId: 'a', vector: [1, 0] },
			],
		})
		const restored = fromSnapshot(snapshot)
		expect(restored.search([1, 1], 2)).toEqual(index.search([1, 1], 2))
	})
})

describe('ClusteredVectorIndex', () => {
	it('should validate its options', () => {
		expect(() => new ClusteredVectorIndex('cosine', undefined, { clusters: 0 })).toThrow(InvalidConfigError)
		expect(() => new ClusteredVectorIndex('cosine', undefined, { clusters: 4, nprobe: 5 })).toThrow(InvalidConfigError)
		expect(() => new ClusteredVectorIndex('cosine', undefined, { iterations: 0 })).toThrow(InvalidConfigError)
	})

	it('should match exact search on well-separated data', () => {
		const entries = groupedEntries()
		const exact = new ExactVectorIndex('cosine')
		const clustered = new ClusteredVectorIndex('cosine', undefined, { clusters: 4, nprobe: 1, minClusterSize: 2 })
		exact.rebuild(entries)
		clustered.rebuild(entries)

		expect(clustered.trained).toBe(true)
		for (const query of [
			[0, 1, 0.07],
			[0.12, 0, 1],
			[1, 0.19, 0],
		]) {
			expect(clustered.search(query, 5)).toEqual(exact.search(query, 5))
		}
	})

	it('should widen the probe until it has k candidates', () => {
		const clustered = new ClusteredVectorIndex('cosine', undefined, { clusters: 4, nprobe: 1, minClusterSize: 2 })
		clustered.rebuild(groupedEntries())
		expect(clustered.search([0, 1, 0.07], 30)).toHaveLength(30)
	})

	it('should scan exactly while the index is too small to partition', () => {
		const entries = groupedEntries().slice(0, 10)
		const exact = new ExactVectorIndex('cosine')
		const clustered = new ClusteredVectorIndex('cosine')
		exact.rebuild(entries)
		clustered.rebuild(entries)
		expect(clustered.search([1, 0.05, 0], 10)).toEqual(exact.search([1, 0.05, 0], 10))
	})

	it('should file entries added after training and forget removed ones', () => {
		const clustered = new ClusteredVectorIndex('cosine', undefined, { clusters: 4, nprobe: 1, minClusterSize: 2 })
		clustered.rebuild(groupedEntries())
		clustered.add('new', [0, 1, 0.5])
		const [hit] = clustered.search([0, 1, 0.5], 1)
		expect(hit.chunkId).toBe('new')
		expect(hit.score).toBeCloseTo(1)
		clustered.remove('new')
		expect(clustered.search([0, 1, 0.5], 1)[0].chunkId).not.toBe('new')
	})
})
