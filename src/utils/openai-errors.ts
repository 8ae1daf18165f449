import { APIError, APIUserAbortError } from 'openai'
import { CancelledError, errorMessage, InvalidInputError, isAbortError, StudyMateError } from '../errors.js'

type ServiceErrorClass = new (
	message: string,
	options: { status?: number; retryable?: boolean; cause?: unknown },
) => StudyMateError

/**
 * Translates a failure of an OpenAI SDK call into the library's error taxonomy.
 * Rate limits, server errors and connection failures are retryable; authentication
 * and unknown-model failures are not; a rejected request body is the caller's to fix.
 */
export function mapOpenAIError(error: unknown, service: string, ServiceError: ServiceErrorClass): StudyMateError {
	if (error instanceof StudyMateError) return error
	if (error instanceof APIUserAbortError || isAbortError(error)) {
		return new CancelledError(undefined, { cause: error })
	}
	if (!(error instanceof APIError)) {
		return new ServiceError(`${service} failed: ${errorMessage(error)}`, { retryable: false, cause: error })
	}

	const status = error.status
	if (status === undefined) {
		// no response: connection reset, DNS, client-side timeout
		return new ServiceError(`${service} failed: ${error.message}`, { retryable: true, cause: error })
	}

	const message = `${service} failed (HTTP ${status}): ${error.message}`
	switch (status) {
		case 400:
		case 413:
		case 422:
			return new InvalidInputError(message, { cause: error })
		case 401:
		case 403:
		case 404:
			return new ServiceError(message, { status, retryable: false, cause: error })
		case 408:
		case 409:
		case 429:
			return new ServiceError(message, { status, retryable: true, cause: error })
		default:
			return new ServiceError(message, { status, retryable: status >= 500, cause: error })
	}
}
