import { describe, expect, it } from 'vitest'
import { formatFlashcardsForPrint, formatQuizForPrint } from './format.js'

describe('formatQuizForPrint', () => {
	it('should list questions and an answer key', () => {
		const text = formatQuizForPrint(
			[
				{ question: 'What drives evaporation?', options: ['Wind', 'Heat', 'Salt', 'Gravity'], correctAnswer: 'Heat' },
				{ question: 'Clouds form by?', options: ['Condensation', 'Melting'], correctAnswer: 'Condensation' },
			],
			'water cycle',
		)

		expect(text.split('\n')).toEqual([
			'STUDYMATE QUIZ',
			'==============',
			'',
			'Source: water cycle',
			'Total Questions: 2',
			'',
			'QUESTION 1: What drives evaporation?',
			'  A) Wind',
			'  B) Heat',
			'  C) Salt',
			'  D) Gravity',
			'',
			'QUESTION 2: Clouds form by?',
			'  A) Condensation',
			'  B) Melting',
			'',
			'ANSWER KEY',
			'----------',
			'1. B) Heat',
			'2. A) Condensation',
			'',
			'='.repeat(43),
		])
	})

	it('should say so when there is nothing to export', () => {
		expect(formatQuizForPrint([])).toBe('No questions to export.')
	})
})

describe('formatFlashcardsForPrint', () => {
	it('should print one block per card', () => {
		const text = formatFlashcardsForPrint([{ term: 'Mitosis', definition: 'Cell division into two nuclei.' }])

		expect(text.split('\n')).toEqual([
			'STUDYMATE FLASHCARDS',
			'====================',
			'',
			'Source: Topic',
			'Total Cards: 1',
			'',
			'CARD 1',
			'--------',
			'TERM: Mitosis',
			'',
			'DEFINITION: Cell division into two nuclei.',
			'',
			'',
			'='.repeat(43),
			'Study tip: Cover the definitions and test your knowledge!',
		])
	})

	it('should say so when there are no cards', () => {
		expect(formatFlashcardsForPrint([])).toBe('No flashcards to export.')
	})
})
