import { readFile } from 'node:fs/promises'
import { basename } from 'node:path'
import { InvalidInputError, errorMessage } from '../errors.js'
import { settleInSlices } from '../utils/batch.js'
import { type IngestFailure, type IngestInput, mimeTypeFromPath } from './ingestor.js'

export interface ReadFilesResult {
	inputs: IngestInput[]
	failures: IngestFailure[]
}

/**
 * Reads files from disk as ingest inputs. A file that cannot be read becomes a
 * failure of its own; the other files are still returned.
 */
export async function readInputFiles(
	paths: readonly string[],
	options: { mimeType?: string; concurrency?: number } = {},
): Promise<ReadFilesResult> {
	const settled = await settleInSlices(paths, options.concurrency ?? 8, async (path) => ({
		sourceName: basename(path),
		mimeType: options.mimeType ?? mimeTypeFromPath(path),
		bytes: await readFile(path),
	}))

	const result: ReadFilesResult = { inputs: [], failures: [] }
	for (const outcome of settled) {
		if (outcome.status === 'fulfilled') {
			result.inputs.push(outcome.value)
			continue
		}
		result.failures.push({
			sourceName: basename(outcome.item),
			error: new InvalidInputError(`Could not read ${outcome.item}: ${errorMessage(outcome.reason)}`, {
				cause: outcome.reason,
			}),
		})
	}
	return result
}
