import chalk from 'chalk'
import { InvalidArgumentError } from 'commander'
import { table } from 'table'
import type { Generation, RetrievedPassage } from '../types.js'
import { truncate } from '../utils/text.js'

export function printJson(value: unknown): void {
	console.log(JSON.stringify(value, null, 2))
}

export function printHeading(title: string): void {
	console.log(chalk.bold.blue(`\n${title}`))
	console.log(chalk.gray('─'.repeat(50)))
}

/** Warns when the answer was produced without supporting material. */
export function printSupport(generation: Generation<unknown>): void {
	if (!generation.supported) {
		console.log(chalk.yellow('\n⚠ No supporting material was found in this corpus. Treat the reply with care.'))
	}
}

export function printSources(passages: readonly RetrievedPassage[]): void {
	if (passages.length === 0) return
	console.log(`\n${chalk.bold('Sources')}`)
	const rows = [['#', 'Document', 'Score', 'Excerpt']]
	passages.forEach((passage, i) => {
		rows.push([
			String(i + 1),
			passage.documentId,
			passage.score.toFixed(3),
			truncate(passage.text.replace(/\s+/g, ' '), 60),
		])
	})
	console.log(
		table(rows, {
			columns: {
				0: { alignment: 'right' },
				2: { alignment: 'right' },
				3: { width: 60, wrapWord: true },
			},
		}),
	)
}

export function parsePositiveInt(value: string): number {
	const parsed = Number.parseInt(value, 10)
	if (!Number.isInteger(parsed) || parsed < 1) {
		throw new InvalidArgumentError(`Expected a positive integer, got "${value}"`)
	}
	return parsed
}

export function parseScore(value: string): number {
	const parsed = Number.parseFloat(value)
	if (!Number.isFinite(parsed)) throw new InvalidArgumentError(`Expected a number, got "${value}"`)
	return parsed
}
