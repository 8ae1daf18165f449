import type { Flashcard, ParseOutcome, QuizItem } from '../types.js'
import { normalizeWhitespace } from '../utils/text.js'

const QUESTION_HEADER = /^QUESTION\s+\d+\s*[:.]\s*(.*)$/i
const OPTION_LINE = /^([A-Z])[).]\s+(.+)$/
const ANSWER_LINE = /^ANSWER\s*:\s*(.+)$/i
const FLASHCARD_HEADER = /^FLASHCARD[_\s]?\d+\s*:?$/i
const TERM_LINE = /^TERM\s*:\s*(.+)$/i
const DEFINITION_LINE = /^DEFINITION\s*:\s*(.+)$/i

const unparseable = (raw: string, reason: string): ParseOutcome<never> => ({ kind: 'unparseable', raw, reason })

function contentLines(raw: string): string[] {
	return raw
		.split(/\r?\n/)
		.map((line) => line.trim())
		.filter((line) => line.length > 0)
}

/** Splits lines into blocks that each start with a header line. Lines before the first header are ignored. */
function splitBlocks(lines: string[], header: RegExp): string[][] {
	const blocks: string[][] = []
	for (const line of lines) {
		if (header.test(line)) blocks.push([line])
		else blocks.at(-1)?.push(line)
	}
	return blocks
}

/** Exact option text wins over a leading letter, so "A cell wall" is not read as option A. */
function resolveAnswer(answer: string, options: string[]): string | undefined {
	const wanted = answer.toLowerCase()
	const exact = options.find((option) => option.toLowerCase() === wanted)
	if (exact !== undefined) return exact

	const letter = /^([A-Z])(?:[).:]\s*(.*))?$/.exec(answer)
	if (!letter) return undefined
	const option = options[letter[1].charCodeAt(0) - 65]
	const echoed = letter[2]?.trim().toLowerCase()
	if (option === undefined || (echoed && echoed !== option.toLowerCase())) return undefined
	return option
}

/**
 * Parses quiz blocks of the form
 *
 * ```
 * QUESTION 1: ...
 * A) ...
 * B) ...
 * ANSWER: B
 * ```
 *
 * Every block must have a question, at least two options lettered in order, and an
 * answer that names one of them by letter or exact text. A single malformed block
 * makes the whole reply unparseable.
 */
export function parseQuiz(raw: string): ParseOutcome<QuizItem[]> {
	const blocks = splitBlocks(contentLines(raw), QUESTION_HEADER)
	if (blocks.length === 0) return unparseable(raw, 'no QUESTION blocks found')

	const items: QuizItem[] = []
	for (const [n, block] of blocks.entries()) {
		const label = `question ${n + 1}`
		const header = QUESTION_HEADER.exec(block[0])
		let question = header ? header[1].trim() : ''
		const options: string[] = []
		let answer: string | undefined

		for (const line of block.slice(1)) {
			const option = OPTION_LINE.exec(line)
			const answerMatch = ANSWER_LINE.exec(line)
			if (answer !== undefined) {
				return unparseable(raw, `unexpected text after the answer of ${label}: "${line}"`)
			}
			if (answerMatch) {
				answer = answerMatch[1].trim()
			} else if (option) {
				const expected = String.fromCharCode(65 + options.length)
				if (option[1] !== expected) {
					return unparseable(raw, `${label} has option ${option[1]} where ${expected} was expected`)
				}
				options.push(option[2].trim())
			} else if (options.length === 0) {
				question = `${question} ${line}`.trim()
			} else {
				return unparseable(raw, `unexpected line in ${label}: "${line}"`)
			}
		}

		if (question.length === 0) return unparseable(raw, `${label} has no question text`)
		if (options.length < 2) return unparseable(raw, `${label} has fewer than two options`)
		if (answer === undefined) return unparseable(raw, `${label} has no ANSWER line`)
		const correctAnswer = resolveAnswer(answer, options)
		if (correctAnswer === undefined) {
			return unparseable(raw, `the answer of ${label} ("${answer}") does not match any option`)
		}
		items.push({ question, options, correctAnswer })
	}
	return { kind: 'parsed', value: items }
}

/**
 * Parses `FLASHCARD_n:` blocks with a `TERM:` line followed by a `DEFINITION:` line.
 * Lines after the definition continue it.
 */
export function parseFlashcards(raw: string): ParseOutcome<Flashcard[]> {
	const blocks = splitBlocks(contentLines(raw), FLASHCARD_HEADER)
	if (blocks.length === 0) return unparseable(raw, 'no FLASHCARD blocks found')

	const cards: Flashcard[] = []
	for (const [n, block] of blocks.entries()) {
		const label = `flashcard ${n + 1}`
		const [termLine, definitionLine, ...rest] = block.slice(1)
		const term = termLine === undefined ? null : TERM_LINE.exec(termLine)
		if (!term) return unparseable(raw, `${label} does not start with a TERM line`)
		const definition = definitionLine === undefined ? null : DEFINITION_LINE.exec(definitionLine)
		if (!definition) return unparseable(raw, `${label} has no DEFINITION line after its term`)
		if (rest.some((line) => TERM_LINE.test(line) || DEFINITION_LINE.test(line))) {
			return unparseable(raw, `${label} has more than one term or definition`)
		}
		cards.push({ term: term[1].trim(), definition: [definition[1].trim(), ...rest].join(' ') })
	}
	return { kind: 'parsed', value: cards }
}

/** Free-text modes: whitespace normalization only. An empty reply is unparseable. */
export function parseText(raw: string): ParseOutcome<string> {
	const text = normalizeWhitespace(raw)
	return text.length > 0 ? { kind: 'parsed', value: text } : unparseable(raw, 'the model returned an empty response')
}
