import { throwIfCancelled } from '../utils/retry.js'

/** Turns raw file bytes into plain text. */
export type TextExtractor = (bytes: Uint8Array, signal?: AbortSignal) => Promise<string>

export const MIME_TYPES = {
	text: 'text/plain',
	markdown: 'text/markdown',
	pdf: 'application/pdf',
	docx: 'application/vnd.openxmlformats-officedocument.wordprocessingml.document',
} as const

export const extractPlainText: TextExtractor = async (bytes) => new TextDecoder('utf-8').decode(bytes)

/** Extracts page text with pdfjs-dist. Pages are separated by blank lines. */
export const extractPdfText: TextExtractor = async (bytes, signal) => {
	const pdfjs = await import('pdfjs-dist/legacy/build/pdf.mjs')
	// pdfjs takes ownership of the buffer it is given
	const pdf = await pdfjs.getDocument({ data: new Uint8Array(bytes), disableFontFace: true }).promise
	try {
		const pages: string[] = []
		for (let pageNumber = 1; pageNumber <= pdf.numPages; pageNumber++) {
			throwIfCancelled(signal)
			const page = await pdf.getPage(pageNumber)
			const content = await page.getTextContent()
			const text = content.items
				.map((item) => ('str' in item ? `${item.str}${item.hasEOL ? '\n' : ''}` : ''))
				.join('')
			pages.push(text)
		}
		return pages.join('\n\n')
	} finally {
		await pdf.destroy()
	}
}

export const extractDocxText: TextExtractor = async (bytes) => {
	const { default: mammoth } = await import('mammoth')
	const result = await mammoth.extractRawText({ buffer: Buffer.from(bytes) })
	return result.value
}

export const DEFAULT_EXTRACTORS: Record<string, TextExtractor> = {
	[MIME_TYPES.text]: extractPlainText,
	[MIME_TYPES.markdown]: extractPlainText,
	[MIME_TYPES.pdf]: extractPdfText,
	[MIME_TYPES.docx]: extractDocxText,
}
