import { beforeEach, describe, expect, it } from 'vitest'
import { StudyCorpus } from './corpus.js'
import { HashingEmbeddingProvider } from './embeddings/hashing.js'
import { DimensionMismatchError, InvalidConfigError } from './errors.js'
import { ConsoleLogger, NullLogger } from './logger.js'
import { InMemoryCorpusStore } from './store/memory.js'
import { createTestLogger } from './testing/debug-logger.js'
import { InMemoryEventLogger } from './testing/event-logger.js'
import { EchoGenerativeModel, ScriptedGenerativeModel } from './testing/models.js'
import type { CallOptions, CorpusStore, EmbeddingProvider, GenerativeModel } from './types.js'

const PHOTOSYNTHESIS =
	'Photosynthesis converts light energy into chemical energy. In plants, photosynthesis takes place inside chloroplasts and releases oxygen.'
const MITOSIS = 'Cells divide through mitosis. Each daughter cell receives a full copy of the chromosomes.'
const REVOLUTION = 'The French Revolution began in 1789 and reshaped European politics for decades.'

/** Hashing embeddings that wait for `gate` before answering. */
class GatedEmbeddings implements EmbeddingProvider {
	private readonly inner = new HashingEmbeddingProvider()
	readonly model = this.inner.model
	readonly dimensions = this.inner.dimensions
	readonly metric = this.inner.metric
	gate: Promise<void> = Promise.resolve()

	async embed(texts: string[], options?: CallOptions): Promise<number[][]> {
		await this.gate
		return this.inner.embed(texts, options)
	}
}

const MATERIAL = [
	{ sourceName: 'photosynthesis.txt', text: PHOTOSYNTHESIS },
	{ sourceName: 'mitosis.md', text: MITOSIS },
	{ sourceName: 'revolution.txt', text: REVOLUTION },
]

describe('StudyCorpus', () => {
	let store: InMemoryCorpusStore
	let events: InMemoryEventLogger

	beforeEach(() => {
		store = new InMemoryCorpusStore()
		events = new InMemoryEventLogger()
	})

	function createCorpus(model: GenerativeModel = new EchoGenerativeModel()) {
		return new StudyCorpus('biology', {
			embeddings: new HashingEmbeddingProvider(),
			model,
			store,
			eventBus: events,
			logger: createTestLogger(),
		})
	}

	it('should ingest documents and answer from the matching passage only', async () => {
		const corpus = createCorpus()
		const report = await corpus.ingest(MATERIAL)

		expect(report.added.map((a) => [a.sourceName, a.chunks])).toEqual([
			['photosynthesis.txt', 1],
			['mitosis.md', 1],
			['revolution.txt', 1],
		])
		expect(report.failed).toEqual([])
		expect(corpus.size).toEqual({ documents: 3, chunks: 3 })

		const answer = await corpus.ask('What is photosynthesis?')
		const photosynthesisId = report.added[0].documentId
		expect(answer.supported).toBe(true)
		expect(answer.passages.map((p) => p.chunkId)).toEqual([`${photosynthesisId}#0`])
		expect(answer.passages[0].score).toBeCloseTo(0.4269, 3)
		expect(answer.value).toBe(`[1] ${PHOTOSYNTHESIS}`)
	})

	it('should report unsupported answers when nothing is similar enough', async () => {
		const corpus = createCorpus()
		await corpus.ingest(MATERIAL)

		const answer = await corpus.ask('quantum gravity')
		expect(answer.supported).toBe(false)
		expect(answer.passages).toEqual([])
		expect(answer.value).toBe('No supporting material was found in the study corpus.')
	})

	it('should skip content it already holds and report unreadable files', async () => {
		const corpus = createCorpus()
		await corpus.ingest(MATERIAL.slice(0, 1))

		const report = await corpus.ingest([
			{ sourceName: 'copy.txt', text: `${PHOTOSYNTHESIS}\n` },
			{ sourceName: 'scan.png', mimeType: 'image/png', bytes: new Uint8Array([1, 2, 3]) },
			MATERIAL[1],
		])

		expect(report.added.map((a) => a.sourceName)).toEqual(['mitosis.md'])
		expect(report.skipped.map((s) => s.sourceName)).toEqual(['copy.txt'])
		expect(report.failed.map((f) => [f.sourceName, f.error.code])).toEqual([['scan.png', 'UNSUPPORTED_FORMAT']])
		expect(events.filter('document:skipped')).toHaveLength(1)
		expect(events.filter('document:failed')).toHaveLength(1)
	})

	it('should limit retrieval to the requested documents', async () => {
		const corpus = createCorpus()
		const report = await corpus.ingest(MATERIAL)
		const mitosisId = report.added[1].documentId

		expect(await corpus.retrieve('photosynthesis', { documentIds: [mitosisId] })).toEqual([])
		expect(events.filter('query:retrieved').map((e) => e.payload.hits)).toEqual([0])
	})

	it('should remove a document with its chunks', async () => {
		const corpus = createCorpus()
		const report = await corpus.ingest(MATERIAL)
		const photosynthesisId = report.added[0].documentId

		expect(await corpus.removeDocument(photosynthesisId)).toBe(true)
		expect(await corpus.removeDocument(photosynthesisId)).toBe(false)
		expect(corpus.getChunks(photosynthesisId)).toEqual([])
		expect(await corpus.retrieve('What is photosynthesis?')).toEqual([])
		expect((await store.load('biology'))?.documents.map((d) => d.sourceName)).toEqual(['mitosis.md', 'revolution.txt'])
		expect(events.find('document:removed')?.payload).toEqual({ corpusId: 'biology', documentId: photosynthesisId })
	})

	it('should reopen a persisted corpus without re-embedding', async () => {
		await createCorpus().ingest(MATERIAL)

		const reopened = await StudyCorpus.open('biology', { embeddings: new HashingEmbeddingProvider(), store })
		expect(reopened.stats()).toEqual({
			corpusId: 'biology',
			documents: 3,
			chunks: 3,
			embeddingModel: 'hashing-v1-256',
			dimensions: 256,
			indexKind: 'exact',
		})
		const [passage] = await reopened.retrieve('How do cells divide?')
		expect(passage.text).toBe(MITOSIS)
	})

	it('should refuse to reopen a corpus embedded with another model', async () => {
		await createCorpus().ingest(MATERIAL)
		await expect(
			StudyCorpus.open('biology', { embeddings: new HashingEmbeddingProvider(128), store }),
		).rejects.toThrow(DimensionMismatchError)
	})

	it('should re-embed every document on rebuild', async () => {
		const corpus = createCorpus()
		await corpus.ingest(MATERIAL)
		events.clear()

		await corpus.rebuild()
		expect(corpus.size).toEqual({ documents: 3, chunks: 3 })
		expect(events.filter('index:rebuilt').map((e) => e.payload)).toEqual([
			{ corpusId: 'biology', entries: 3, dimensions: 256 },
		])
	})

	it('should generate a quiz from retrieved material', async () => {
		const model = new ScriptedGenerativeModel([
			'QUESTION 1: Where does photosynthesis take place?\nA) Nucleus\nB) Chloroplasts\nANSWER: B',
		])
		const corpus = createCorpus(model)
		await corpus.ingest(MATERIAL)

		const quiz = await corpus.quiz('photosynthesis', { count: 1, difficulty: 'basic' })
		expect(quiz.value).toEqual([
			{
				question: 'Where does photosynthesis take place?',
				options: ['Nucleus', 'Chloroplasts'],
				correctAnswer: 'Chloroplasts',
			},
		])
		expect(model.prompts[0]).toContain(`[1] ${PHOTOSYNTHESIS}`)
		expect(model.prompts[0]).not.toContain(MITOSIS)
	})

	it('should summarize the opening material when no topic is given', async () => {
		const corpus = createCorpus()
		await corpus.ingest(MATERIAL)

		const summary = await corpus.summarize(undefined, { k: 2 })
		expect(summary.passages.map((p) => p.text)).toEqual([PHOTOSYNTHESIS, MITOSIS])
		expect(summary.value).toBe(`[1] ${PHOTOSYNTHESIS}\n\n---\n\n[2] ${MITOSIS}`)
	})

	it('should require a generative model for generation', async () => {
		const corpus = new StudyCorpus('biology', { embeddings: new HashingEmbeddingProvider() })
		await corpus.ingest(MATERIAL)
		await expect(corpus.ask('What is photosynthesis?')).rejects.toThrow(InvalidConfigError)
	})

	it('should rank the matching paragraph of a single study document first', async () => {
		const corpus = new StudyCorpus('biology', {
			embeddings: new HashingEmbeddingProvider(),
			model: new EchoGenerativeModel(),
			settings: { chunking: { chunkSize: 160, overlap: 0, minChunkSize: 50 } },
		})
		const report = await corpus.ingest([
			{ sourceName: 'week-3.md', text: [PHOTOSYNTHESIS, MITOSIS, REVOLUTION].join('\n\n') },
		])
		const documentId = report.added[0].documentId
		expect(report.added[0].chunks).toBe(3)

		const ranked = await corpus.retrieve('What is photosynthesis?', { minScore: 0 })
		expect(ranked.map((p) => p.chunkId)).toEqual([`${documentId}#0`, `${documentId}#1`, `${documentId}#2`])
		expect(ranked[0].score).toBeGreaterThan(ranked[1].score)

		const answer = await corpus.ask('What is photosynthesis?')
		expect(answer.passages.map((p) => p.chunkId)).toEqual([`${documentId}#0`])
		expect(answer.value).toBe(`[1] ${PHOTOSYNTHESIS}`)
	})

	it('should not bring back a document removed while a rebuild was embedding', async () => {
		const embeddings = new GatedEmbeddings()
		const corpus = new StudyCorpus('biology', { embeddings, store })
		const report = await corpus.ingest(MATERIAL)
		const photosynthesisId = report.added[0].documentId

		let release: () => void = () => {}
		embeddings.gate = new Promise<void>((resolve) => {
			release = resolve
		})
		const rebuilding = corpus.rebuild()
		const removing = corpus.removeDocument(photosynthesisId)
		release()

		await rebuilding
		expect(await removing).toBe(true)
		expect(corpus.size).toEqual({ documents: 2, chunks: 2 })
		expect(await corpus.retrieve('photosynthesis chloroplasts')).toEqual([])

		const reopened = await StudyCorpus.open('biology', { embeddings: new HashingEmbeddingProvider(), store })
		expect(reopened.size).toEqual({ documents: 2, chunks: 2 })
		expect(reopened.getDocument(photosynthesisId)).toBeUndefined()
	})

	it('should keep the previous state when persisting fails', async () => {
		const failing: CorpusStore = {
			load: async () => undefined,
			save: async () => {
				throw new Error('disk full')
			},
			delete: async () => false,
		}
		const corpus = new StudyCorpus('biology', { embeddings: new HashingEmbeddingProvider(), store: failing })

		await expect(corpus.ingest(MATERIAL)).rejects.toThrow('disk full')
		expect(corpus.size).toEqual({ documents: 0, chunks: 0 })
		expect(await corpus.retrieve('What is photosynthesis?')).toEqual([])
	})

	it('should shuffle flashcards on request', async () => {
		const cards = [
			'FLASHCARD_1:\nTERM: Chloroplast\nDEFINITION: Organelle where photosynthesis happens.',
			'FLASHCARD_2:\nTERM: Oxygen\nDEFINITION: Gas released by photosynthesis.',
			'FLASHCARD_3:\nTERM: Light energy\nDEFINITION: Energy plants capture from the Sun.',
		].join('\n\n')
		const model = new ScriptedGenerativeModel([cards, cards])
		const corpus = new StudyCorpus('biology', {
			embeddings: new HashingEmbeddingProvider(),
			model,
			random: () => 0,
		})
		await corpus.ingest(MATERIAL)

		const inOrder = await corpus.flashcards('photosynthesis', { count: 3 })
		expect(inOrder.value.map((card) => card.term)).toEqual(['Chloroplast', 'Oxygen', 'Light energy'])

		const shuffled = await corpus.flashcards('photosynthesis', { count: 3, shuffle: true })
		expect(shuffled.value.map((card) => card.term)).toEqual(['Oxygen', 'Light energy', 'Chloroplast'])
	})

	it('should stay silent unless test logs are requested', () => {
		expect(createTestLogger({})).toBeInstanceOf(NullLogger)
		expect(createTestLogger({ STUDYMATE_TEST_LOGS: 'verbose' })).toBeInstanceOf(NullLogger)
		expect(createTestLogger({ STUDYMATE_TEST_LOGS: 'warn' })).toBeInstanceOf(ConsoleLogger)
	})

	it('should reject an empty corpus id', () => {
		expect(() => new StudyCorpus(' ', { embeddings: new HashingEmbeddingProvider() })).toThrow(InvalidConfigError)
	})
})
