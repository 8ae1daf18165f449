import type { IndexSnapshot, SimilarityMetric, VectorIndex, VectorIndexKind } from '../types.js'
import { ClusteredVectorIndex, type ClusteredIndexOptions } from './clustered.js'
import { ExactVectorIndex } from './exact.js'

export interface VectorIndexOptions {
	kind?: VectorIndexKind
	metric?: SimilarityMetric
	/** Established by the first vector when omitted. */
	dimensions?: number
	clustered?: ClusteredIndexOptions
}

export function createVectorIndex(options: VectorIndexOptions = {}): VectorIndex {
	const metric = options.metric ?? 'cosine'
	switch (options.kind ?? 'exact') {
		case 'exact':
			return new ExactVectorIndex(metric, options.dimensions)
		case 'clustered':
			return new ClusteredVectorIndex(metric, options.dimensions, options.clustered)
	}
}

/** Recreates an index from a snapshot, with the same kind, metric and insertion order. */
export function fromSnapshot(snapshot: IndexSnapshot, clustered?: ClusteredIndexOptions): VectorIndex {
	const index = createVectorIndex({
		kind: snapshot.kind,
		metric: snapshot.metric,
		dimensions: snapshot.dimensions,
		clustered,
	})
	index.rebuild(snapshot.entries)
	return index
}

export { BaseVectorIndex, SCORE_EPSILON } from './base.js'
export { ClusteredVectorIndex, type ClusteredIndexOptions } from './clustered.js'
export { ExactVectorIndex } from './exact.js'
export { cosineSimilarity, l2Distance, scoreRange, similarity } from './metrics.js'
