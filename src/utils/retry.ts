import { CancelledError, errorMessage, isAbortError, isRetryable } from '../errors.js'
import { NullLogger } from '../logger.js'
import type { Logger } from '../types.js'

export interface RetryOptions {
	/** Human-readable name of the call, used in logs. */
	label: string
	/** Attempts after the first one. Only retryable errors are retried. */
	maxRetries: number
	/** Delay before the first retry; doubles on every further retry. */
	retryDelayMs?: number
	maxDelayMs?: number
	/** Per-attempt timeout. */
	timeoutMs?: number
	/** Builds the error an attempt fails with when it times out. */
	onTimeout?: (timeoutMs: number) => Error
	signal?: AbortSignal
	logger?: Logger
	onRetry?: (attempt: number, error: unknown) => void | Promise<void>
}

export function throwIfCancelled(signal?: AbortSignal): void {
	if (signal?.aborted) {
		throw new CancelledError(undefined, { cause: signal.reason })
	}
}

/** Resolves after `ms`, or rejects with a `CancelledError` when the signal aborts first. */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
	return new Promise((resolve, reject) => {
		if (signal?.aborted) {
			reject(new CancelledError(undefined, { cause: signal.reason }))
			return
		}
		const onAbort = () => {
			clearTimeout(timer)
			reject(new CancelledError(undefined, { cause: signal?.reason }))
		}
		const timer = setTimeout(() => {
			signal?.removeEventListener('abort', onAbort)
			resolve()
		}, ms)
		signal?.addEventListener('abort', onAbort, { once: true })
	})
}

/**
 * Runs a task with its own AbortSignal that fires when the parent signal aborts
 * or the timeout elapses. The returned promise settles no later than either event,
 * even if the task ignores its signal.
 */
export async function withTimeout<T>(
	task: (signal: AbortSignal) => Promise<T>,
	options: { timeoutMs?: number; signal?: AbortSignal; onTimeout?: (timeoutMs: number) => Error } = {},
): Promise<T> {
	const { timeoutMs, signal: parent } = options
	throwIfCancelled(parent)

	const controller = new AbortController()
	let rejectInterrupted: (error: Error) => void = () => {}
	const interrupted = new Promise<never>((_, reject) => {
		rejectInterrupted = reject
	})

	const onParentAbort = () => {
		controller.abort(parent?.reason)
		rejectInterrupted(new CancelledError(undefined, { cause: parent?.reason }))
	}
	parent?.addEventListener('abort', onParentAbort, { once: true })

	const timer =
		timeoutMs !== undefined && timeoutMs > 0
			? setTimeout(() => {
					const error = options.onTimeout?.(timeoutMs) ?? new Error(`Timed out after ${timeoutMs}ms`)
					controller.abort(error)
					rejectInterrupted(error)
				}, timeoutMs)
			: undefined

	try {
		return await Promise.race([task(controller.signal), interrupted])
	} finally {
		clearTimeout(timer)
		parent?.removeEventListener('abort', onParentAbort)
	}
}

/**
 * Executes a task with a per-attempt timeout and bounded, exponentially backed-off
 * retries. Non-retryable errors are rethrown immediately; an abort of the caller's
 * signal surfaces as a `CancelledError`.
 */
export async function withRetries<T>(task: (signal: AbortSignal) => Promise<T>, options: RetryOptions): Promise<T> {
	const logger = options.logger ?? new NullLogger()
	const attempts = Math.max(0, options.maxRetries) + 1
	const baseDelay = options.retryDelayMs ?? 250
	const maxDelay = options.maxDelayMs ?? 8_000
	let lastError: unknown

	for (let attempt = 1; attempt <= attempts; attempt++) {
		throwIfCancelled(options.signal)
		try {
			const result = await withTimeout(task, {
				timeoutMs: options.timeoutMs,
				signal: options.signal,
				onTimeout: options.onTimeout,
			})
			if (attempt > 1) {
				logger.info(`${options.label} succeeded after retry`, { attempt })
			}
			return result
		} catch (error) {
			lastError = error
			if (error instanceof CancelledError) throw error
			if (isAbortError(error) && options.signal?.aborted) {
				throw new CancelledError(undefined, { cause: error })
			}
			if (!isRetryable(error)) throw error

			if (attempt < attempts) {
				logger.warn(`${options.label} failed, retrying`, {
					attempt,
					maxRetries: options.maxRetries,
					error: errorMessage(error),
				})
				await options.onRetry?.(attempt, error)
				await sleep(Math.min(baseDelay * 2 ** (attempt - 1), maxDelay), options.signal)
			} else {
				logger.error(`${options.label} failed after all retries`, {
					attempts,
					error: errorMessage(error),
				})
			}
		}
	}
	throw lastError
}
