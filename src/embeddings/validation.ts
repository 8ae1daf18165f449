import { InvalidInputError } from '../errors.js'

/** Rejects empty or whitespace-only inputs, which no embedding model accepts. */
export function assertEmbeddable(texts: readonly string[]): void {
	texts.forEach((text, position) => {
		if (text.trim().length === 0) {
			throw new InvalidInputError(`Cannot embed empty text (input ${position})`)
		}
	})
}
