import type { Flashcard, QuizItem } from '../types.js'

const RULE = '='.repeat(43)

/** Renders quiz items as plain text, with the answer key at the end. */
export function formatQuizForPrint(items: readonly QuizItem[], source = 'Topic'): string {
	if (items.length === 0) return 'No questions to export.'

	const lines = ['STUDYMATE QUIZ', '==============', '', `Source: ${source}`, `Total Questions: ${items.length}`, '']
	items.forEach((item, i) => {
		lines.push(`QUESTION ${i + 1}: ${item.question}`)
		item.options.forEach((option, j) => lines.push(`  ${String.fromCharCode(65 + j)}) ${option}`))
		lines.push('')
	})

	lines.push('ANSWER KEY', '----------')
	items.forEach((item, i) => {
		const letter = String.fromCharCode(65 + item.options.indexOf(item.correctAnswer))
		lines.push(`${i + 1}. ${letter}) ${item.correctAnswer}`)
	})
	lines.push('', RULE)
	return lines.join('\n')
}

export function formatFlashcardsForPrint(cards: readonly Flashcard[], source = 'Topic'): string {
	if (cards.length === 0) return 'No flashcards to export.'

	const lines = ['STUDYMATE FLASHCARDS', '====================', '', `Source: ${source}`, `Total Cards: ${cards.length}`, '']
	cards.forEach((card, i) => {
		lines.push(`CARD ${i + 1}`, '--------', `TERM: ${card.term}`, '', `DEFINITION: ${card.definition}`, '', '')
	})
	lines.push(RULE, 'Study tip: Cover the definitions and test your knowledge!')
	return lines.join('\n')
}
