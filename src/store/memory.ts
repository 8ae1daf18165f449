import type { CorpusState, CorpusStore } from '../types.js'

/** Keeps corpus state in process memory. States are copied in and out. */
export class InMemoryCorpusStore implements CorpusStore {
	private readonly states = new Map<string, CorpusState>()

	async load(corpusId: string): Promise<CorpusState | undefined> {
		const state = this.states.get(corpusId)
		return state ? structuredClone(state) : undefined
	}

	async save(state: CorpusState): Promise<void> {
		this.states.set(state.corpusId, structuredClone(state))
	}

	async delete(corpusId: string): Promise<boolean> {
		return this.states.delete(corpusId)
	}

	/** Ids of every stored corpus. */
	list(): string[] {
		return [...this.states.keys()]
	}
}
