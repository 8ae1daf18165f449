import { writeFile } from 'node:fs/promises'
import chalk from 'chalk'
import { Command } from 'commander'
import { formatFlashcardsForPrint, formatQuizForPrint } from '../../generation/format.js'
import type { Difficulty, LearnerProfile } from '../../types.js'
import { parsePositiveInt, printHeading, printJson, printSupport } from '../output.js'
import { runWithSession } from '../session.js'

interface ItemCommandOptions {
	count?: number
	difficulty?: string
	export?: string
}

interface FlashcardCommandOptions extends ItemCommandOptions {
	shuffle?: boolean
}

function parseDifficulty(value: string | undefined): Difficulty | undefined {
	if (value === undefined) return undefined
	if (value === 'basic' || value === 'intermediate' || value === 'advanced') return value
	throw new Error(`--difficulty must be basic, intermediate or advanced, got "${value}"`)
}

export const quizCommand = new Command('quiz')
	.description('Generate a multiple-choice quiz on a topic')
	.argument('<topic>', 'Topic to be quizzed on')
	.option('-n, --count <count>', 'Number of questions', parsePositiveInt)
	.option('--difficulty <level>', 'basic, intermediate or advanced')
	.option('-e, --export <file>', 'Also write a printable copy to this file')
	.action(async (topic: string, options: ItemCommandOptions, command: Command) => {
		await runWithSession(command, 'Writing questions...', true, async ({ corpus, json }, spinner) => {
			const generation = await corpus.quiz(topic, {
				count: options.count,
				difficulty: parseDifficulty(options.difficulty),
			})
			spinner.stop()
			if (options.export) await writeFile(options.export, formatQuizForPrint(generation.value, topic), 'utf-8')

			if (json) {
				printJson(generation)
				return
			}
			printHeading(`Quiz: ${topic}`)
			generation.value.forEach((item, i) => {
				console.log(chalk.bold(`\n${i + 1}. ${item.question}`))
				item.options.forEach((option, j) => {
					const marker = option === item.correctAnswer ? chalk.green('✔') : ' '
					console.log(`  ${marker} ${String.fromCharCode(65 + j)}) ${option}`)
				})
			})
			printSupport(generation)
		})
	})

export const flashcardsCommand = new Command('flashcards')
	.description('Generate term/definition flashcards on a topic')
	.argument('<topic>', 'Topic for the flashcards')
	.option('-n, --count <count>', 'Number of cards', parsePositiveInt)
	.option('--difficulty <level>', 'basic, intermediate or advanced')
	.option('-e, --export <file>', 'Also write a printable copy to this file')
	.option('--shuffle', 'Present the cards in random order')
	.action(async (topic: string, options: FlashcardCommandOptions, command: Command) => {
		await runWithSession(command, 'Writing flashcards...', true, async ({ corpus, json }, spinner) => {
			const generation = await corpus.flashcards(topic, {
				count: options.count,
				difficulty: parseDifficulty(options.difficulty),
				shuffle: options.shuffle,
			})
			spinner.stop()
			if (options.export) await writeFile(options.export, formatFlashcardsForPrint(generation.value, topic), 'utf-8')

			if (json) {
				printJson(generation)
				return
			}
			printHeading(`Flashcards: ${topic}`)
			for (const card of generation.value) {
				console.log(`\n${chalk.cyan(card.term)}\n  ${card.definition}`)
			}
			printSupport(generation)
		})
	})

export const summarizeCommand = new Command('summarize')
	.description('Summarize a topic, or the whole corpus when no topic is given')
	.argument('[topic]', 'Topic to summarize')
	.option('--difficulty <level>', 'basic, intermediate or advanced')
	.action(async (topic: string | undefined, options: ItemCommandOptions, command: Command) => {
		await runWithSession(command, 'Summarizing...', true, async ({ corpus, json }, spinner) => {
			const generation = await corpus.summarize(topic, { difficulty: parseDifficulty(options.difficulty) })
			spinner.stop()

			if (json) {
				printJson(generation)
				return
			}
			printHeading(topic ? `Summary: ${topic}` : 'Summary')
			console.log(generation.value)
			printSupport(generation)
		})
	})

interface PlanOptions {
	duration?: string
	dailyTime?: string
	level?: string
	style?: string
	name?: string
	course?: string
	goals?: string
}

function parseStyle(value: string | undefined): LearnerProfile['learningStyle'] {
	if (value === undefined) return undefined
	if (value === 'theory' || value === 'hands-on' || value === 'mixed') return value
	throw new Error(`--style must be theory, hands-on or mixed, got "${value}"`)
}

export const planCommand = new Command('plan')
	.description('Create a personalized study plan for a learning goal')
	.argument('<goal>', 'What you want to learn')
	.option('--duration <duration>', 'How long the plan should run, e.g. "3 weeks"')
	.option('--daily-time <time>', 'Time available per day, e.g. "45 minutes"')
	.option('--level <level>', 'basic, intermediate or advanced')
	.option('--style <style>', 'theory, hands-on or mixed')
	.option('--name <name>', 'Your name')
	.option('--course <course>', 'Your course or major')
	.option('--goals <goals>', 'What you want to achieve')
	.action(async (goal: string, options: PlanOptions, command: Command) => {
		await runWithSession(command, 'Planning...', true, async ({ corpus, json }, spinner) => {
			const profile: LearnerProfile = {
				name: options.name,
				course: options.course,
				goals: options.goals,
				level: parseDifficulty(options.level),
				learningStyle: parseStyle(options.style),
				duration: options.duration,
				dailyTime: options.dailyTime,
			}
			const generation = await corpus.studyPlan(goal, profile)
			spinner.stop()

			if (json) {
				printJson(generation)
				return
			}
			printHeading(`Study plan: ${goal}`)
			console.log(generation.value)
			printSupport(generation)
		})
	})
