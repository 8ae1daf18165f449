import { assembleContext } from '../context-assembler.js'
import {
	errorMessage,
	GenerationServiceError,
	isAbortError,
	MalformedGenerationError,
	StudyMateError,
} from '../errors.js'
import { NullLogger } from '../logger.js'
import type {
	CallOptions,
	ConversationTurn,
	EventBus,
	Generation,
	GenerationValueMap,
	GenerativeModel,
	Logger,
	ParseOutcome,
	RetrievedPassage,
	TaskMode,
} from '../types.js'
import { withRetries } from '../utils/retry.js'
import { buildDirective, type DirectiveOptions } from './directives.js'
import { parseFlashcards, parseQuiz, parseText } from './parsers.js'

interface ModeHandler<T> {
	/** Label the query is rendered under in the prompt. */
	queryLabel: string
	parse: (raw: string) => ParseOutcome<T>
}

const MODES: { [M in TaskMode]: ModeHandler<GenerationValueMap[M]> } = {
	answer: { queryLabel: 'Question', parse: parseText },
	summarize: { queryLabel: 'Topic', parse: parseText },
	'study-plan': { queryLabel: 'Learning goal', parse: parseText },
	quiz: { queryLabel: 'Topic', parse: parseQuiz },
	flashcards: { queryLabel: 'Topic', parse: parseFlashcards },
}

export interface OrchestratorOptions {
	model: GenerativeModel
	/** Prompt budget in characters (default: 12000). */
	maxChars?: number
	/** Re-dispatches with a stricter directive after an unparseable reply (default: 1). */
	maxParseRetries?: number
	/** Retries of a failed model call (default: 2). */
	maxRetries?: number
	/** Per-call timeout (default: 60000). */
	timeoutMs?: number
	retryDelayMs?: number
	logger?: Logger
	eventBus?: EventBus
}

export interface GenerateRequest<M extends TaskMode> extends DirectiveOptions, CallOptions {
	mode: M
	/** The question, or the topic for the other modes. */
	query: string
	/** Ranked passages from the retriever. */
	passages: readonly RetrievedPassage[]
	history?: readonly ConversationTurn[]
}

/**
 * Turns retrieved passages into a task result. Each mode pairs a directive with a
 * parser; one request is one model call, repeated only when the call fails with a
 * retryable error or the reply cannot be parsed.
 */
export class GenerationOrchestrator {
	private readonly logger: Logger
	private readonly maxChars: number
	private readonly maxParseRetries: number

	constructor(private readonly options: OrchestratorOptions) {
		this.logger = options.logger ?? new NullLogger()
		this.maxChars = options.maxChars ?? 12_000
		this.maxParseRetries = options.maxParseRetries ?? 1
	}

	async generate<M extends TaskMode>(request: GenerateRequest<M>): Promise<Generation<GenerationValueMap[M]>> {
		const handler = MODES[request.mode]
		const attempts = Math.max(0, this.maxParseRetries) + 1
		let failure = { raw: '', reason: 'no reply was received' }

		for (let attempt = 1; attempt <= attempts; attempt++) {
			const context = assembleContext({
				query: request.query,
				directive: buildDirective(request.mode, request, attempt > 1),
				passages: request.passages,
				history: request.history,
				maxChars: this.maxChars,
				queryLabel: handler.queryLabel,
			})

			const raw = await this.dispatch(context.text, request.signal)
			const outcome = handler.parse(raw)

			if (outcome.kind === 'parsed') {
				await this.options.eventBus?.emit({
					type: 'generation:finish',
					payload: { mode: request.mode, attempts: attempt, supported: context.supported },
				})
				return {
					mode: request.mode,
					value: outcome.value,
					attempts: attempt,
					supported: context.supported,
					passages: context.passages,
				}
			}

			failure = outcome
			this.logger.warn('Model reply could not be parsed', { mode: request.mode, attempt, reason: outcome.reason })
			if (attempt < attempts) {
				await this.options.eventBus?.emit({
					type: 'generation:retry',
					payload: { mode: request.mode, attempt, reason: outcome.reason },
				})
			}
		}

		throw new MalformedGenerationError(request.mode, attempts, failure.raw, failure.reason)
	}

	private dispatch(prompt: string, signal?: AbortSignal): Promise<string> {
		const { model } = this.options
		return withRetries(
			async (attemptSignal) => {
				try {
					return await model.complete(prompt, { signal: attemptSignal })
				} catch (error) {
					if (error instanceof StudyMateError || isAbortError(error)) throw error
					throw new GenerationServiceError(`Generative model ${model.model} failed: ${errorMessage(error)}`, {
						retryable: false,
						cause: error,
					})
				}
			},
			{
				label: `Generation (${model.model})`,
				maxRetries: this.options.maxRetries ?? 2,
				retryDelayMs: this.options.retryDelayMs,
				timeoutMs: this.options.timeoutMs ?? 60_000,
				onTimeout: (ms) => new GenerationServiceError(`Generation timed out after ${ms}ms`),
				signal,
				logger: this.logger,
				onRetry: (attempt, error) =>
					this.options.eventBus?.emit({
						type: 'service:retry',
						payload: { label: `generate:${model.model}`, attempt, error: errorMessage(error) },
					}),
			},
		)
	}
}
