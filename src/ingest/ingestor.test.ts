import { mkdtemp, rm, writeFile } from 'node:fs/promises'
import { tmpdir } from 'node:os'
import { join } from 'node:path'
import { describe, expect, it } from 'vitest'
import { InvalidInputError, UnsupportedFormatError } from '../errors.js'
import { sha256 } from '../utils/text.js'
import { readInputFiles } from './files.js'
import { DocumentIngestor, documentIdFor, mimeTypeFromPath, normalizeMimeType } from './ingestor.js'

const encode = (text: string) => new TextEncoder().encode(text)

describe('mimeTypeFromPath', () => {
	it('should recognize the supported extensions', () => {
		expect(mimeTypeFromPath('notes/Week 1.MD')).toBe('text/markdown')
		expect(mimeTypeFromPath('slides.pdf')).toBe('application/pdf')
		expect(mimeTypeFromPath('essay.docx')).toBe(
			'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
		)
		expect(mimeTypeFromPath('photo.png')).toBeUndefined()
	})

	it('should strip MIME parameters', () => {
		expect(normalizeMimeType('Text/Plain; charset=utf-8')).toBe('text/plain')
	})
})

describe('DocumentIngestor', () => {
	it('should create a normalized document from plain-text bytes', async () => {
		const ingestor = new DocumentIngestor()
		const document = await ingestor.ingest({
			sourceName: 'cells.txt',
			mimeType: 'text/plain',
			bytes: encode('\uFEFFCells divide.  \r\n\r\n\r\n\r\nMitosis has four phases.\r\n'),
		})

		expect(document.rawText).toBe('Cells divide.\n\nMitosis has four phases.')
		expect(document.mimeType).toBe('text/plain')
		expect(document.contentHash).toBe(sha256('Cells divide.\n\nMitosis has four phases.'))
		expect(document.id).toBe(documentIdFor(document.contentHash))
		expect(document.id).toMatch(/^doc_[0-9a-f]{16}$/)
		expect(document.ingestedAt).toBeInstanceOf(Date)
	})

	it('should guess the format from the file name', async () => {
		const document = await new DocumentIngestor().ingest({ sourceName: 'notes.md', bytes: encode('# Heading') })
		expect(document.mimeType).toBe('text/markdown')
	})

	it('should accept already-extracted text', async () => {
		const document = await new DocumentIngestor().ingest({ sourceName: 'pasted', text: 'Osmosis moves water.' })
		expect(document).toMatchObject({ mimeType: 'text/plain', rawText: 'Osmosis moves water.' })
	})

	it('should give identical content the same id', async () => {
		const ingestor = new DocumentIngestor()
		const a = await ingestor.ingest({ sourceName: 'a.txt', text: 'Same text.' })
		const b = await ingestor.ingest({ sourceName: 'b.md', bytes: encode('Same text.\n') })
		expect(a.id).toBe(b.id)
	})

	it('should reject formats it cannot read', async () => {
		const error = await new DocumentIngestor()
			.ingest({ sourceName: 'photo.png', mimeType: 'image/png', bytes: encode('x') })
			.catch((e: unknown) => e)
		expect(error).toBeInstanceOf(UnsupportedFormatError)
		expect(error).toMatchObject({ code: 'UNSUPPORTED_FORMAT', mimeType: 'image/png' })
	})

	it('should reject inputs above the size limit', async () => {
		const ingestor = new DocumentIngestor({ maxBytes: 10 })
		await expect(ingestor.ingest({ sourceName: 'big.txt', text: 'x'.repeat(11) })).rejects.toThrow(
			'big.txt is 11 bytes, larger than the 10-byte limit',
		)
	})

	it('should reject documents without text', async () => {
		await expect(new DocumentIngestor().ingest({ sourceName: 'blank.txt', text: ' \n\n ' })).rejects.toThrow(
			'No text content found in blank.txt',
		)
		await expect(new DocumentIngestor().ingest({ sourceName: 'nothing.txt' })).rejects.toThrow(InvalidInputError)
	})

	it('should wrap extractor failures as invalid input', async () => {
		const ingestor = new DocumentIngestor().registerExtractor('application/x-broken', async () => {
			throw new Error('bad header')
		})
		const error = await ingestor
			.ingest({ sourceName: 'file.bin', mimeType: 'application/x-broken', bytes: encode('x') })
			.catch((e: unknown) => e)
		expect(error).toBeInstanceOf(InvalidInputError)
		expect(error).toMatchObject({ message: 'Could not read file.bin as application/x-broken' })
	})

	it('should use registered extractors', async () => {
		const ingestor = new DocumentIngestor().registerExtractor('Application/X-Upper', async (bytes) =>
			new TextDecoder().decode(bytes).toUpperCase(),
		)
		expect(ingestor.supports('application/x-upper')).toBe(true)
		const document = await ingestor.ingest({ sourceName: 'x', mimeType: 'application/x-upper', bytes: encode('loud') })
		expect(document.rawText).toBe('LOUD')
	})

	it('should report failures without failing the batch', async () => {
		const { documents, failures } = await new DocumentIngestor().ingestMany([
			{ sourceName: 'good.txt', text: 'Enzymes speed up reactions.' },
			{ sourceName: 'photo.png', mimeType: 'image/png', bytes: encode('x') },
			{ sourceName: 'also-good.md', text: 'Proteins fold.' },
		])
		expect(documents.map((d) => d.sourceName)).toEqual(['good.txt', 'also-good.md'])
		expect(failures).toHaveLength(1)
		expect(failures[0].sourceName).toBe('photo.png')
		expect(failures[0].error).toBeInstanceOf(UnsupportedFormatError)
	})

	it('should stop a batch when cancelled', async () => {
		const controller = new AbortController()
		controller.abort()
		await expect(
			new DocumentIngestor().ingestMany([{ sourceName: 'a.txt', text: 'x' }], { signal: controller.signal }),
		).rejects.toMatchObject({ code: 'CANCELLED' })
	})
})

describe('readInputFiles', () => {
	it('should report an unreadable file without dropping the others', async () => {
		const directory = await mkdtemp(join(tmpdir(), 'studymate-files-'))
		try {
			await writeFile(join(directory, 'good.txt'), 'Ribosomes build proteins.')
			const missing = join(directory, 'missing.txt')

			const { inputs, failures } = await readInputFiles([join(directory, 'good.txt'), missing])

			expect(inputs.map((input) => [input.sourceName, input.mimeType])).toEqual([['good.txt', 'text/plain']])
			expect(failures).toHaveLength(1)
			expect(failures[0].sourceName).toBe('missing.txt')
			expect(failures[0].error).toBeInstanceOf(InvalidInputError)
			expect(failures[0].error.message).toMatch(/^Could not read .*missing\.txt: ENOENT/)

			const { documents } = await new DocumentIngestor().ingestMany(inputs)
			expect(documents.map((d) => d.rawText)).toEqual(['Ribosomes build proteins.'])
		} finally {
			await rm(directory, { recursive: true, force: true })
		}
	})

	it('should apply an explicit MIME type to every file', async () => {
		const directory = await mkdtemp(join(tmpdir(), 'studymate-files-'))
		try {
			await writeFile(join(directory, 'notes.data'), '# Heading')
			const { inputs } = await readInputFiles([join(directory, 'notes.data')], { mimeType: 'text/markdown' })
			expect(inputs[0].mimeType).toBe('text/markdown')
		} finally {
			await rm(directory, { recursive: true, force: true })
		}
	})
})
