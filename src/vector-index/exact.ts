import type { VectorIndexKind } from '../types.js'
import { BaseVectorIndex, type IndexState } from './base.js'

/** Brute-force index: every query is scored against every entry. O(n) per search. */
export class ExactVectorIndex extends BaseVectorIndex {
	readonly kind: VectorIndexKind = 'exact'

	protected createState(dimensions: number | undefined): IndexState {
		return { entries: new Map(), dimensions, nextSeq: 0 }
	}

	protected candidates(state: IndexState): Iterable<string> {
		return state.entries.keys()
	}
}
