import { createHash } from 'node:crypto'

/**
 * Normalizes extracted document text. Chunk offsets are computed against the
 * result, so this must stay stable across versions.
 */
export function normalizeDocumentText(text: string): string {
	return text
		.replace(/^\uFEFF/, '')
		.replace(/\r\n?/g, '\n')
		.replace(/[ \t\f\v]+$/gm, '')
		.replace(/\n{3,}/g, '\n\n')
		.trim()
}

/** Collapses runs of spaces inside lines and runs of blank lines, then trims. */
export function normalizeWhitespace(text: string): string {
	return text
		.replace(/\r\n?/g, '\n')
		.replace(/[ \t\f\v]+/g, ' ')
		.replace(/ ?\n ?/g, '\n')
		.replace(/\n{3,}/g, '\n\n')
		.trim()
}

/** Key used to detect near-identical passages: lower-cased with whitespace collapsed. */
export function dedupeKey(text: string): string {
	return text.toLowerCase().replace(/\s+/g, ' ').trim()
}

export function sha256(text: string): string {
	return createHash('sha256').update(text, 'utf8').digest('hex')
}

export function truncate(text: string, max: number): string {
	return text.length > max ? `${text.substring(0, max - 3)}...` : text
}
