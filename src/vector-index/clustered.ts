import { InvalidConfigError } from '../errors.js'
import type { SimilarityMetric, VectorIndexKind } from '../types.js'
import { BaseVectorIndex, type IndexSlot, type IndexState } from './base.js'
import { similarity } from './metrics.js'

export interface ClusteredIndexOptions {
	/** Number of k-means partitions (default: 16). */
	clusters?: number
	/** Partitions scanned per query (default: 4). */
	nprobe?: number
	/** Below `clusters * minClusterSize` entries the index scans everything (default: 8). */
	minClusterSize?: number
	/** k-means iterations per rebuild (default: 10). */
	iterations?: number
}

interface Partition {
	centroids: number[][]
	lists: Array<Set<string>>
	assignment: Map<string, number>
}

interface ClusteredState extends IndexState {
	partition?: Partition
}

/**
 * An inverted-file index. `rebuild` trains k-means centroids over the entries and
 * files each entry under its nearest centroid; a query scores only the entries of
 * the `nprobe` closest partitions, widening the probe until it has at least k
 * candidates. Entries added after training are filed under the existing centroids.
 *
 * Recall is traded for speed only once the index is large enough to partition;
 * smaller indexes are scanned exactly.
 */
export class ClusteredVectorIndex extends BaseVectorIndex<ClusteredState> {
	readonly kind: VectorIndexKind = 'clustered'
	private readonly options: Required<ClusteredIndexOptions>

	constructor(metric: SimilarityMetric, dimensions?: number, options: ClusteredIndexOptions = {}) {
		super(metric, dimensions)
		this.options = { clusters: 16, nprobe: 4, minClusterSize: 8, iterations: 10, ...options }
		const { clusters, nprobe, minClusterSize, iterations } = this.options
		if (!Number.isInteger(clusters) || clusters < 1) {
			throw new InvalidConfigError(`clusters must be a positive integer, got ${clusters}`, 'clusters')
		}
		if (!Number.isInteger(nprobe) || nprobe < 1 || nprobe > clusters) {
			throw new InvalidConfigError(`nprobe must be an integer between 1 and ${clusters}, got ${nprobe}`, 'nprobe')
		}
		if (!Number.isInteger(minClusterSize) || minClusterSize < 1) {
			throw new InvalidConfigError(`minClusterSize must be a positive integer, got ${minClusterSize}`, 'minClusterSize')
		}
		if (!Number.isInteger(iterations) || iterations < 1) {
			throw new InvalidConfigError(`iterations must be a positive integer, got ${iterations}`, 'iterations')
		}
	}

	/** Whether the last rebuild produced a partition. */
	get trained(): boolean {
		return this.state.partition !== undefined
	}

	protected createState(dimensions: number | undefined): ClusteredState {
		return { entries: new Map(), dimensions, nextSeq: 0 }
	}

	protected candidates(state: ClusteredState, query: number[], k: number): Iterable<string> {
		const partition = state.partition
		if (!partition || state.entries.size < this.options.clusters * this.options.minClusterSize) {
			return state.entries.keys()
		}

		const ranked = partition.centroids
			.map((centroid, cluster) => ({ cluster, score: similarity(this.metric, query, centroid) }))
			.sort((a, b) => b.score - a.score || a.cluster - b.cluster)

		const ids: string[] = []
		for (let probe = 0; probe < ranked.length; probe++) {
			if (probe >= this.options.nprobe && ids.length >= k) break
			ids.push(...partition.lists[ranked[probe].cluster])
		}
		return ids
	}

	protected onInsert(state: ClusteredState, chunkId: string, slot: IndexSlot): void {
		const partition = state.partition
		if (!partition) return
		const cluster = nearestCentroid(this.metric, slot.vector, partition.centroids)
		partition.lists[cluster].add(chunkId)
		partition.assignment.set(chunkId, cluster)
	}

	protected onDelete(state: ClusteredState, chunkId: string): void {
		const partition = state.partition
		const cluster = partition?.assignment.get(chunkId)
		if (!partition || cluster === undefined) return
		partition.lists[cluster].delete(chunkId)
		partition.assignment.delete(chunkId)
	}

	protected finalize(state: ClusteredState): void {
		const ordered = [...state.entries].sort(([, a], [, b]) => a.seq - b.seq)
		const count = Math.min(this.options.clusters, ordered.length)
		if (count === 0) return

		// deterministic seeding: evenly spaced entries in insertion order
		let centroids = Array.from({ length: count }, (_, i) => [...ordered[Math.floor((i * ordered.length) / count)][1].vector])
		let members: number[] = []

		for (let iteration = 0; iteration < this.options.iterations; iteration++) {
			const next = ordered.map(([, slot]) => nearestCentroid(this.metric, slot.vector, centroids))
			const converged = next.every((cluster, i) => cluster === members[i])
			members = next
			if (converged) break
			centroids = centroids.map((centroid, cluster) => {
				const vectors = ordered.filter((_, i) => members[i] === cluster).map(([, slot]) => slot.vector)
				return vectors.length > 0 ? mean(vectors) : centroid
			})
		}

		const partition: Partition = {
			centroids,
			lists: centroids.map(() => new Set<string>()),
			assignment: new Map(),
		}
		ordered.forEach(([chunkId], i) => {
			partition.lists[members[i]].add(chunkId)
			partition.assignment.set(chunkId, members[i])
		})
		state.partition = partition
	}
}

function nearestCentroid(metric: SimilarityMetric, vector: number[], centroids: number[][]): number {
	let best = 0
	let bestScore = Number.NEGATIVE_INFINITY
	centroids.forEach((centroid, cluster) => {
		const score = similarity(metric, vector, centroid)
		if (score > bestScore) {
			best = cluster
			bestScore = score
		}
	})
	return best
}

function mean(vectors: number[][]): number[] {
	const result = new Array<number>(vectors[0].length).fill(0)
	for (const vector of vectors) {
		for (let i = 0; i < vector.length; i++) result[i] += vector[i]
	}
	return result.map((value) => value / vectors.length)
}
