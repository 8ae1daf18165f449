import { InvalidInputError } from './errors.js'
import type { ConversationTurn, PromptContext, RetrievedPassage } from './types.js'

export const NO_SUPPORT_MARKER = 'No supporting material was found in the study corpus.'
export const PASSAGE_SEPARATOR = '\n\n---\n\n'

export interface AssembleOptions {
	query: string
	directive: string
	/** Ranked passages, most similar first. */
	passages: readonly RetrievedPassage[]
	/** Prior turns owned by the caller, oldest first. */
	history?: readonly ConversationTurn[]
	/** Upper bound on the rendered prompt length in characters. */
	maxChars: number
	/** Label rendered in front of the query (default: `Question`). */
	queryLabel?: string
}

interface Parts {
	directive: string
	history: readonly ConversationTurn[]
	passages: readonly RetrievedPassage[]
	query: string
	queryLabel: string
}

export function renderPrompt(parts: Parts): string {
	const sections = [parts.directive.trim()]

	if (parts.history.length > 0) {
		const turns = parts.history.map((turn) => `${turn.role === 'user' ? 'Student' : 'Tutor'}: ${turn.content.trim()}`)
		sections.push(`Conversation so far:\n${turns.join('\n')}`)
	}

	if (parts.passages.length > 0) {
		const blocks = parts.passages.map((passage, i) => `[${i + 1}] ${passage.text.trim()}`)
		sections.push(`Context:\n${blocks.join(PASSAGE_SEPARATOR)}`)
	} else {
		sections.push(`Context:\n${NO_SUPPORT_MARKER}`)
	}

	sections.push(`${parts.queryLabel}: ${parts.query.trim()}`)
	return sections.join('\n\n')
}

/**
 * Builds the prompt for one request within a character budget.
 *
 * The directive and query are mandatory. Recent history turns are added next,
 * newest first, then passages in rank order. A passage that would overflow the
 * budget is dropped whole and nothing ranked below it is tried.
 */
export function assembleContext(options: AssembleOptions): PromptContext {
	const { query, directive, maxChars } = options
	const queryLabel = options.queryLabel ?? 'Question'
	if (!Number.isInteger(maxChars) || maxChars <= 0) {
		throw new InvalidInputError(`maxChars must be a positive integer, got ${maxChars}`)
	}

	const parts: Parts = { directive, history: [], passages: [], query, queryLabel }
	const base = renderPrompt(parts)
	if (base.length > maxChars) {
		throw new InvalidInputError(
			`Query and instructions need ${base.length} characters, more than the ${maxChars}-character budget`,
		)
	}

	const history = options.history ?? []
	let kept: ConversationTurn[] = []
	for (let i = history.length - 1; i >= 0; i--) {
		const candidate = [history[i], ...kept]
		if (renderPrompt({ ...parts, history: candidate }).length > maxChars) break
		kept = candidate
	}
	parts.history = kept

	const included: RetrievedPassage[] = []
	for (const passage of options.passages) {
		if (renderPrompt({ ...parts, passages: [...included, passage] }).length > maxChars) break
		included.push(passage)
	}
	parts.passages = included

	return {
		query,
		directive,
		passages: included,
		history: kept,
		text: renderPrompt(parts),
		maxChars,
		supported: included.length > 0,
	}
}
