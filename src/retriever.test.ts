import { describe, expect, it } from 'vitest'
import { InvalidInputError, StudyMateError } from './errors.js'
import { Retriever } from './retriever.js'
import type { CallOptions, Chunk, EmbeddingProvider } from './types.js'
import { ExactVectorIndex } from './vector-index/index.js'

/** Embeds each known text to a fixed 2-d vector. */
class TableEmbeddings implements EmbeddingProvider {
	readonly model = 'table'
	readonly dimensions = 2
	readonly metric = 'cosine'
	readonly calls: string[][] = []

	constructor(private readonly table: Record<string, number[]>) {}

	async embed(texts: string[], _options?: CallOptions): Promise<number[][]> {
		this.calls.push(texts)
		return texts.map((text) => this.table[text] ?? [0, 1])
	}
}

function chunk(id: string, documentId: string, text: string): Chunk {
	return { id, documentId, index: 0, text, startOffset: 0, endOffset: text.length }
}

function setup(entries: Array<[Chunk, number[]]>, defaults?: { k?: number; minScore?: number }) {
	const embeddings = new TableEmbeddings({ 'rain?': [1, 0] })
	const index = new ExactVectorIndex('cosine')
	const chunks = new Map<string, Chunk>()
	for (const [c, vector] of entries) {
		index.add(c.id, vector)
		chunks.set(c.id, c)
	}
	const retriever = new Retriever({ embeddings, index, resolveChunk: (id) => chunks.get(id), defaults })
	return { retriever, embeddings, index, chunks }
}

describe('Retriever', () => {
	it('should return passages in descending score order', async () => {
		const { retriever } = setup([
			[chunk('b#0', 'b', 'Clouds form from vapour.'), [1, 1]],
			[chunk('a#0', 'a', 'Rain falls from clouds.'), [1, 0]],
			[chunk('c#0', 'c', 'Unrelated text.'), [0, 1]],
		])
		const passages = await retriever.retrieve('rain?')
		expect(passages.map((p) => p.chunkId)).toEqual(['a#0', 'b#0'])
		expect(passages[0]).toEqual({ chunkId: 'a#0', documentId: 'a', text: 'Rain falls from clouds.', score: 1 })
		expect(passages[1].score).toBeCloseTo(Math.SQRT1_2)
	})

	it('should return an empty result when every hit is below the threshold', async () => {
		const { retriever } = setup([[chunk('c#0', 'c', 'Unrelated text.'), [0, 1]]])
		expect(await retriever.retrieve('rain?')).toEqual([])
	})

	it('should honour per-call k and minScore', async () => {
		const { retriever } = setup([
			[chunk('a#0', 'a', 'one'), [1, 0]],
			[chunk('a#1', 'a', 'two'), [1, 0.2]],
			[chunk('a#2', 'a', 'three'), [1, 1]],
		])
		expect((await retriever.retrieve('rain?', { k: 1 })).map((p) => p.chunkId)).toEqual(['a#0'])
		expect((await retriever.retrieve('rain?', { minScore: 0.9 })).map((p) => p.chunkId)).toEqual(['a#0', 'a#1'])
	})

	it('should use configured defaults', async () => {
		const { retriever } = setup(
			[
				[chunk('a#0', 'a', 'one'), [1, 0]],
				[chunk('a#1', 'a', 'two'), [1, 0.2]],
			],
			{ k: 1 },
		)
		expect(await retriever.retrieve('rain?')).toHaveLength(1)
	})

	it('should drop passages whose text repeats a higher-ranked one', async () => {
		const { retriever } = setup([
			[chunk('a#0', 'a', 'Water  evaporates.'), [1, 0]],
			[chunk('b#0', 'b', 'water evaporates.'), [1, 0.1]],
			[chunk('c#0', 'c', 'Vapour condenses.'), [1, 0.2]],
		])
		const passages = await retriever.retrieve('rain?')
		expect(passages.map((p) => p.chunkId)).toEqual(['a#0', 'c#0'])
	})

	it('should restrict results to the requested documents', async () => {
		const { retriever } = setup([
			[chunk('a#0', 'a', 'one'), [1, 0]],
			[chunk('b#0', 'b', 'two'), [1, 0.1]],
			[chunk('b#1', 'b', 'three'), [1, 0.2]],
		])
		const passages = await retriever.retrieve('rain?', { k: 1, documentIds: ['b'] })
		expect(passages.map((p) => p.chunkId)).toEqual(['b#0'])
	})

	it('should return nothing from an empty index', async () => {
		const { retriever, embeddings } = setup([])
		expect(await retriever.retrieve('rain?')).toEqual([])
		expect(embeddings.calls).toEqual([['rain?']])
	})

	it('should reject an empty query and a bad k', async () => {
		const { retriever } = setup([])
		await expect(retriever.retrieve('   ')).rejects.toThrow(InvalidInputError)
		await expect(retriever.retrieve('rain?', { k: 0 })).rejects.toThrow(InvalidInputError)
		await expect(retriever.retrieve('rain?', { k: 1.5 })).rejects.toThrow(InvalidInputError)
	})

	it('should report an indexed chunk that cannot be resolved', async () => {
		const { retriever, chunks } = setup([[chunk('a#0', 'a', 'one'), [1, 0]]])
		chunks.clear()
		const error = await retriever.retrieve('rain?').catch((e: unknown) => e)
		expect(error).toBeInstanceOf(StudyMateError)
		expect(error).toMatchObject({ code: 'INDEX_INCONSISTENT' })
	})

	it('should stop once the caller cancels', async () => {
		const { retriever } = setup([[chunk('a#0', 'a', 'one'), [1, 0]]])
		const controller = new AbortController()
		controller.abort()
		await expect(retriever.retrieve('rain?', { signal: controller.signal })).rejects.toMatchObject({ code: 'CANCELLED' })
	})
})
