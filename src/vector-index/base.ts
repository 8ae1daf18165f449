import { DimensionMismatchError, InvalidInputError } from '../errors.js'
import type { IndexEntry, IndexSnapshot, SearchHit, SimilarityMetric, VectorIndex, VectorIndexKind } from '../types.js'
import { l2Distance, norm, cosineSimilarity } from './metrics.js'

/** Scores closer than this are treated as equal and ordered by insertion. */
export const SCORE_EPSILON = 1e-9

export interface IndexSlot {
	vector: number[]
	norm: number
	/** Insertion sequence, used for stable tie-breaking. */
	seq: number
}

export interface IndexState {
	entries: Map<string, IndexSlot>
	dimensions: number | undefined
	nextSeq: number
}

/**
 * Shared storage, validation and ranking for vector indexes. Subclasses decide
 * which entries a query is scored against.
 *
 * All reads go through `this.state`. `rebuild` prepares a complete replacement
 * state and assigns it in one step, so a search never observes a partial build.
 */
export abstract class BaseVectorIndex<TState extends IndexState = IndexState> implements VectorIndex {
	abstract readonly kind: VectorIndexKind
	protected state: TState

	constructor(
		public readonly metric: SimilarityMetric,
		private readonly declaredDimensions?: number,
	) {
		if (declaredDimensions !== undefined && (!Number.isInteger(declaredDimensions) || declaredDimensions <= 0)) {
			throw new InvalidInputError(`Index dimensions must be a positive integer, got ${declaredDimensions}`)
		}
		this.state = this.createState(declaredDimensions)
	}

	get dimensions(): number | undefined {
		return this.state.dimensions
	}

	get size(): number {
		return this.state.entries.size
	}

	has(chunkId: string): boolean {
		return this.state.entries.has(chunkId)
	}

	add(chunkId: string, vector: number[]): void {
		this.insert(this.state, chunkId, vector)
	}

	remove(chunkId: string): boolean {
		if (!this.state.entries.has(chunkId)) return false
		this.onDelete(this.state, chunkId)
		this.state.entries.delete(chunkId)
		return true
	}

	search(query: number[], k: number): SearchHit[] {
		const state = this.state
		if (k <= 0 || state.entries.size === 0) return []
		this.checkVector(state, 'query', query)

		const queryNorm = norm(query)
		const scored: Array<{ chunkId: string; score: number; seq: number }> = []
		for (const chunkId of this.candidates(state, query, k)) {
			const slot = state.entries.get(chunkId)
			if (!slot) continue
			scored.push({ chunkId, score: this.score(query, queryNorm, slot), seq: slot.seq })
		}

		scored.sort((a, b) => (Math.abs(a.score - b.score) <= SCORE_EPSILON ? a.seq - b.seq : b.score - a.score))
		return scored.slice(0, k).map(({ chunkId, score }) => ({ chunkId, score }))
	}

	rebuild(entries: Iterable<IndexEntry>): void {
		const next = this.createState(this.declaredDimensions)
		for (const entry of entries) {
			this.insert(next, entry.chunkId, entry.vector)
		}
		this.finalize(next)
		this.state = next
	}

	toSnapshot(): IndexSnapshot {
		const ordered = [...this.state.entries].sort(([, a], [, b]) => a.seq - b.seq)
		return {
			kind: this.kind,
			metric: this.metric,
			dimensions: this.state.dimensions,
			entries: ordered.map(([chunkId, slot]) => ({ chunkId, vector: [...slot.vector] })),
		}
	}

	protected score(query: number[], queryNorm: number, slot: IndexSlot): number {
		if (this.metric === 'cosine') return cosineSimilarity(query, slot.vector, queryNorm, slot.norm)
		return 1 / (1 + l2Distance(query, slot.vector))
	}

	protected abstract createState(dimensions: number | undefined): TState

	/** Chunk ids the query is scored against. */
	protected abstract candidates(state: TState, query: number[], k: number): Iterable<string>

	protected onInsert(_state: TState, _chunkId: string, _slot: IndexSlot): void {}

	protected onDelete(_state: TState, _chunkId: string): void {}

	/** Runs on a freshly built state before it is swapped in. */
	protected finalize(_state: TState): void {}

	private insert(state: TState, chunkId: string, vector: number[]): void {
		this.checkVector(state, chunkId, vector)
		const existing = state.entries.get(chunkId)
		if (existing) this.onDelete(state, chunkId)

		const copy = [...vector]
		const slot: IndexSlot = { vector: copy, norm: norm(copy), seq: existing?.seq ?? state.nextSeq++ }
		state.dimensions ??= copy.length
		state.entries.set(chunkId, slot)
		this.onInsert(state, chunkId, slot)
	}

	private checkVector(state: TState, label: string, vector: number[]): void {
		if (vector.length === 0) {
			throw new InvalidInputError(`Vector for ${label} is empty`)
		}
		if (state.dimensions !== undefined && vector.length !== state.dimensions) {
			throw new DimensionMismatchError(state.dimensions, vector.length)
		}
		if (!vector.every(Number.isFinite)) {
			throw new InvalidInputError(`Vector for ${label} contains non-finite values`)
		}
	}
}
