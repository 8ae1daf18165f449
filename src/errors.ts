export type ErrorCode =
	| 'INVALID_CONFIG'
	| 'INVALID_INPUT'
	| 'UNSUPPORTED_FORMAT'
	| 'DIMENSION_MISMATCH'
	| 'EMBEDDING_SERVICE'
	| 'GENERATION_SERVICE'
	| 'MALFORMED_GENERATION'
	| 'INDEX_INCONSISTENT'
	| 'CANCELLED'
	| 'INTERNAL'

export interface StudyMateErrorOptions {
	cause?: unknown
	retryable?: boolean
	documentId?: string
	corpusId?: string
}

/**
 * The base class for every error the library raises.
 * `retryable` tells retry loops whether a second attempt can succeed.
 */
export class StudyMateError extends Error {
	public readonly code: ErrorCode
	public readonly retryable: boolean
	public readonly documentId?: string
	public readonly corpusId?: string

	constructor(message: string, code: ErrorCode, options: StudyMateErrorOptions = {}) {
		// Pass the cause to the parent Error constructor for proper chaining
		super(message, { cause: options.cause })
		this.name = 'StudyMateError'
		this.code = code
		this.retryable = options.retryable ?? false
		this.documentId = options.documentId
		this.corpusId = options.corpusId
	}
}

/** Bad chunking, index or runtime parameters. Fatal at setup. */
export class InvalidConfigError extends StudyMateError {
	constructor(
		message: string,
		public readonly field?: string,
	) {
		super(message, 'INVALID_CONFIG')
		this.name = 'InvalidConfigError'
	}
}

/** Input the caller must fix before trying again. */
export class InvalidInputError extends StudyMateError {
	constructor(message: string, options: Omit<StudyMateErrorOptions, 'retryable'> = {}) {
		super(message, 'INVALID_INPUT', options)
		this.name = 'InvalidInputError'
	}
}

export class UnsupportedFormatError extends StudyMateError {
	constructor(
		public readonly mimeType: string,
		options: Omit<StudyMateErrorOptions, 'retryable'> = {},
	) {
		super(`Unsupported document format: ${mimeType || '(none)'}`, 'UNSUPPORTED_FORMAT', options)
		this.name = 'UnsupportedFormatError'
	}
}

/** A vector does not match the index's dimensionality, usually index/model version skew. */
export class DimensionMismatchError extends StudyMateError {
	constructor(
		public readonly expected: number,
		public readonly actual: number,
		message = `Vector has ${actual} dimensions, index expects ${expected}`,
	) {
		super(message, 'DIMENSION_MISMATCH')
		this.name = 'DimensionMismatchError'
	}
}

export class EmbeddingServiceError extends StudyMateError {
	public readonly status?: number

	constructor(message: string, options: StudyMateErrorOptions & { status?: number } = {}) {
		super(message, 'EMBEDDING_SERVICE', { retryable: true, ...options })
		this.name = 'EmbeddingServiceError'
		this.status = options.status
	}
}

export class GenerationServiceError extends StudyMateError {
	public readonly status?: number

	constructor(message: string, options: StudyMateErrorOptions & { status?: number } = {}) {
		super(message, 'GENERATION_SERVICE', { retryable: true, ...options })
		this.name = 'GenerationServiceError'
		this.status = options.status
	}
}

/** The model's response could not be parsed into the structure the task mode requires. */
export class MalformedGenerationError extends StudyMateError {
	constructor(
		public readonly mode: string,
		public readonly attempts: number,
		public readonly raw: string,
		public readonly reason: string,
	) {
		super(`Could not generate structured output for ${mode} after ${attempts} attempt(s): ${reason}`, 'MALFORMED_GENERATION')
		this.name = 'MalformedGenerationError'
	}
}

/** Error thrown when an operation is aborted through its AbortSignal. */
export class CancelledError extends StudyMateError {
	constructor(message = 'Operation was cancelled.', options: { cause?: unknown } = {}) {
		super(message, 'CANCELLED', options)
		this.name = 'CancelledError'
	}
}

export function isRetryable(error: unknown): boolean {
	return error instanceof StudyMateError && error.retryable
}

export function isAbortError(error: unknown): boolean {
	// DOMException extends Error on Node.js 20
	return error instanceof Error && error.name === 'AbortError'
}

export function errorMessage(error: unknown): string {
	return error instanceof Error ? error.message : String(error)
}

/** Wraps anything thrown during a per-document step so batch callers get a uniform error type. */
export function toStudyMateError(error: unknown, options: { documentId?: string; corpusId?: string } = {}): StudyMateError {
	if (error instanceof StudyMateError) return error
	return new StudyMateError(errorMessage(error), 'INTERNAL', { cause: error, ...options })
}
