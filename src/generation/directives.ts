import type { Difficulty, LearnerProfile, TaskMode } from '../types.js'
import { resolveTemplate } from '../utils/template.js'

export interface DirectiveOptions {
	/** Number of quiz questions or flashcards (default: 5). */
	count?: number
	difficulty?: Difficulty
	profile?: LearnerProfile
}

const DIFFICULTY_GUIDANCE: Record<Difficulty, string> = {
	basic: 'Focus on fundamental concepts and key definitions. Use simple, clear language.',
	intermediate: 'Include detailed concepts and the relationships between them. Use moderate academic vocabulary.',
	advanced: 'Focus on complex ideas, nuanced distinctions and advanced terminology.',
}

const GROUNDING =
	'Use only the numbered context passages below. If they do not contain the information needed, say so plainly instead of guessing.'

const STRICT_NOTICE =
	'Your previous reply could not be read. Reply with ONLY the blocks in the exact format shown, with no introduction, no markdown and no closing remarks.'

const ANSWER = `You are a patient tutor helping a student study their own course material.
${GROUNDING}
Answer the question clearly and concisely, and cite passages by their number, e.g. [2].`

const SUMMARIZE = `You are a tutor preparing revision notes.
${GROUNDING}
Summarize the material on the topic below in short paragraphs or bullet points, keeping the key terms and how they relate.
Difficulty: {{difficulty}}. {{guidance}}`

const QUIZ = `You are an examiner writing a multiple-choice quiz from a student's course material.
${GROUNDING}
Write {{count}} questions. Difficulty: {{difficulty}}. {{guidance}}
Each question has four options and exactly one correct answer.

Use this format for every question:
QUESTION 1: <question text>
A) <option>
B) <option>
C) <option>
D) <option>
ANSWER: <letter of the correct option>`

const FLASHCARDS = `You are an educational content creator writing term/definition flashcards.
${GROUNDING}
Write {{count}} flashcards. Difficulty: {{difficulty}}. {{guidance}}
Terms are key concepts or vocabulary; definitions are clear, standalone and two to four sentences long.

Use this format for every card:
FLASHCARD_1:
TERM: <key term or concept>
DEFINITION: <definition>`

const STUDY_PLAN = `You are an educational planner. Create a study plan for the learning goal below.
Base the topics on the numbered context passages from the student's course material where they apply.
Duration: {{duration}}
Daily available time: {{dailyTime}}
Current level: {{level}}
Learning style: {{learningStyle}}
{{profile}}
Give a day-by-day (or week-by-week for longer durations) breakdown with learning objectives, activities with estimated times, and milestone checkpoints. Increase complexity gradually.`

function renderProfile(profile: LearnerProfile | undefined): string {
	if (!profile) return ''
	const lines = [
		profile.name && `- Name: ${profile.name}`,
		profile.course && `- Course: ${profile.course}`,
		profile.goals && `- Goals: ${profile.goals}`,
	].filter((line): line is string => typeof line === 'string' && line.length > 0)
	return lines.length > 0 ? `Learner profile:\n${lines.join('\n')}` : ''
}

/**
 * Builds the task directive for a mode. The strict variant is used after a reply
 * could not be parsed.
 */
export function buildDirective(mode: TaskMode, options: DirectiveOptions = {}, strict = false): string {
	const difficulty = options.difficulty ?? options.profile?.level ?? 'intermediate'
	const data = {
		count: options.count ?? 5,
		difficulty,
		guidance: DIFFICULTY_GUIDANCE[difficulty],
		duration: options.profile?.duration ?? '2 weeks',
		dailyTime: options.profile?.dailyTime ?? '1 hour',
		level: options.profile?.level ?? difficulty,
		learningStyle: options.profile?.learningStyle ?? 'mixed',
		profile: renderProfile(options.profile),
	}

	const templates: Record<TaskMode, string> = {
		answer: ANSWER,
		summarize: SUMMARIZE,
		quiz: QUIZ,
		flashcards: FLASHCARDS,
		'study-plan': STUDY_PLAN,
	}
	const directive = resolveTemplate(templates[mode], data).replace(/\n{2,}/g, '\n')
	return strict ? `${directive}\n${STRICT_NOTICE}` : directive
}
