import { InvalidConfigError } from './errors.js'
import type { Chunk } from './types.js'

/**
 * Configuration options for chunking.
 */
export interface ChunkOptions {
	/** Target chunk length in characters (default: 1200). */
	chunkSize?: number
	/** Overlap between consecutive chunks as a fraction of `chunkSize` (default: 0.15). */
	overlap?: number
	/** A trailing fragment shorter than this is merged into the previous chunk (default: 200). */
	minChunkSize?: number
}

export const DEFAULT_CHUNK_OPTIONS: Required<ChunkOptions> = {
	chunkSize: 1200,
	overlap: 0.15,
	minChunkSize: 200,
}

/**
 * Merges options with the defaults and rejects combinations that cannot
 * produce bounded, gap-free chunks.
 */
export function resolveChunkOptions(options: ChunkOptions = {}): Required<ChunkOptions> {
	const resolved = { ...DEFAULT_CHUNK_OPTIONS, ...options }
	const { chunkSize, overlap, minChunkSize } = resolved

	if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
		throw new InvalidConfigError(`chunkSize must be a positive integer, got ${chunkSize}`, 'chunkSize')
	}
	if (!Number.isFinite(overlap) || overlap < 0) {
		throw new InvalidConfigError(`overlap must be a non-negative fraction, got ${overlap}`, 'overlap')
	}
	if (overlap >= 1) {
		throw new InvalidConfigError('overlap must be smaller than the chunk size', 'overlap')
	}
	if (overlap > 0.5) {
		throw new InvalidConfigError('overlap must not exceed half the chunk size', 'overlap')
	}
	if (!Number.isInteger(minChunkSize) || minChunkSize < 0 || minChunkSize > chunkSize) {
		throw new InvalidConfigError(
			`minChunkSize must be an integer between 0 and chunkSize, got ${minChunkSize}`,
			'minChunkSize',
		)
	}
	return resolved
}

const WHITESPACE = /\s/

/**
 * Picks where a chunk starting at `start` should end. Searches the last half of
 * the window for a paragraph break, then a sentence end, then any whitespace,
 * and falls back to a hard cut at `hardEnd`.
 */
function findBreak(text: string, start: number, hardEnd: number, chunkSize: number): number {
	const floor = start + Math.ceil(chunkSize / 2)

	const paragraph = text.lastIndexOf('\n\n', hardEnd - 2)
	if (paragraph >= floor) return paragraph + 2

	for (let i = hardEnd - 1; i > floor; i--) {
		if (WHITESPACE.test(text[i]) && /[.!?]/.test(text[i - 1])) return i + 1
	}

	for (let i = hardEnd - 1; i >= floor; i--) {
		if (WHITESPACE.test(text[i])) return i + 1
	}

	return hardEnd
}

/** Moves a chunk start forward to the beginning of the next word, staying before `limit`. */
function alignToWordStart(text: string, from: number, limit: number): number {
	for (let i = from; i < limit; i++) {
		if (i === 0) return 0
		if (WHITESPACE.test(text[i - 1]) && !WHITESPACE.test(text[i])) return i
	}
	return from
}

/**
 * Splits normalized text into ordered, overlapping chunks that together cover
 * the whole input.
 *
 * Algorithm:
 * 1. Open a window of `chunkSize` characters at the current start
 * 2. End the chunk at the best break point in the second half of the window
 * 3. Start the next chunk `overlap * chunkSize` characters before that end,
 *    nudged forward to a word boundary
 * 4. Merge a final fragment shorter than `minChunkSize` into its predecessor
 *
 * Every chunk satisfies `chunk.text === text.slice(chunk.startOffset, chunk.endOffset)`.
 */
export function chunkText(documentId: string, text: string, options: ChunkOptions = {}): Chunk[] {
	const { chunkSize, overlap, minChunkSize } = resolveChunkOptions(options)
	if (text.length === 0) return []

	const spans: Array<[number, number]> = []
	const overlapChars = Math.floor(chunkSize * overlap)
	let start = 0

	while (start < text.length) {
		const hardEnd = Math.min(start + chunkSize, text.length)
		const end = hardEnd < text.length ? findBreak(text, start, hardEnd, chunkSize) : hardEnd
		spans.push([start, end])
		if (end >= text.length) break

		let next = alignToWordStart(text, end - overlapChars, end)
		if (next <= start) next = end
		start = next
	}

	if (spans.length > 1) {
		const last = spans[spans.length - 1]
		if (last[1] - last[0] < minChunkSize) {
			spans.pop()
			spans[spans.length - 1][1] = last[1]
		}
	}

	return spans.map(([startOffset, endOffset], index) => ({
		id: `${documentId}#${index}`,
		documentId,
		index,
		text: text.slice(startOffset, endOffset),
		startOffset,
		endOffset,
	}))
}

/**
 * Rebuilds the source text from one document's chunks by dropping each chunk's
 * overlap with its predecessor.
 */
export function reconstructText(chunks: readonly Chunk[]): string {
	const ordered = [...chunks].sort((a, b) => a.index - b.index)
	let text = ''
	let covered = 0
	for (const chunk of ordered) {
		const overlap = Math.max(0, covered - chunk.startOffset)
		text += chunk.text.slice(overlap)
		covered = chunk.endOffset
	}
	return text
}
