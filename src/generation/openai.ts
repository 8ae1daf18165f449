import OpenAI from 'openai'
import { GenerationServiceError } from '../errors.js'
import type { CallOptions, GenerativeModel } from '../types.js'
import { mapOpenAIError } from '../utils/openai-errors.js'

/** The slice of the OpenAI client this model calls. */
export interface ChatClient {
	chat: {
		completions: {
			create(
				body: {
					model: string
					messages: Array<{ role: 'system' | 'user'; content: string }>
					temperature?: number
				},
				options?: { signal?: AbortSignal },
			): Promise<{ choices: Array<{ message: { content: string | null } }> }>
		}
	}
}

export interface OpenAIGenerativeOptions {
	client?: ChatClient
	/** Default: `gpt-4o-mini`. */
	model?: string
	/** Default: 0.2. */
	temperature?: number
}

/** Calls the OpenAI Chat Completions API with the whole prompt as a single user message. */
export class OpenAIGenerativeModel implements GenerativeModel {
	readonly model: string
	private readonly client: ChatClient
	private readonly temperature: number

	constructor(options: OpenAIGenerativeOptions = {}) {
		this.client = options.client ?? new OpenAI({ maxRetries: 0 })
		this.model = options.model ?? 'gpt-4o-mini'
		this.temperature = options.temperature ?? 0.2
	}

	async complete(prompt: string, options: CallOptions = {}): Promise<string> {
		try {
			const response = await this.client.chat.completions.create(
				{
					model: this.model,
					messages: [{ role: 'user', content: prompt }],
					temperature: this.temperature,
				},
				{ signal: options.signal },
			)
			return response.choices[0]?.message.content ?? ''
		} catch (error) {
			throw mapOpenAIError(error, 'Chat Completions API', GenerationServiceError)
		}
	}
}
