export type Settled<TItem, TResult> =
	| { status: 'fulfilled'; item: TItem; value: TResult }
	| { status: 'rejected'; item: TItem; reason: unknown }

/**
 * Maps items through an async worker, at most `concurrency` at a time, in
 * fixed-size slices. Results keep the order of `items`; a failing item is
 * reported instead of failing the whole batch.
 */
export async function settleInSlices<TItem, TResult>(
	items: readonly TItem[],
	concurrency: number,
	worker: (item: TItem, index: number) => Promise<TResult>,
): Promise<Array<Settled<TItem, TResult>>> {
	const size = Math.max(1, concurrency || items.length)
	const results: Array<Settled<TItem, TResult>> = []

	for (let i = 0; i < items.length; i += size) {
		const slice = items.slice(i, i + size)
		const settled = await Promise.all(
			slice.map(async (item, offset): Promise<Settled<TItem, TResult>> => {
				try {
					return { status: 'fulfilled', item, value: await worker(item, i + offset) }
				} catch (reason) {
					return { status: 'rejected', item, reason }
				}
			}),
		)
		results.push(...settled)
	}

	return results
}

/** Splits `items` into consecutive groups of at most `size`. */
export function toBatches<T>(items: readonly T[], size: number): T[][] {
	const batches: T[][] = []
	const step = Math.max(1, size)
	for (let i = 0; i < items.length; i += step) {
		batches.push(items.slice(i, i + step))
	}
	return batches
}

/** Fisher-Yates shuffle into a new array. */
export function shuffle<T>(items: readonly T[], random: () => number = Math.random): T[] {
	const result = [...items]
	for (let i = result.length - 1; i > 0; i--) {
		const j = Math.floor(random() * (i + 1))
		const held = result[i]
		result[i] = result[j]
		result[j] = held
	}
	return result
}
