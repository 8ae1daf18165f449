import SuperJSON from 'superjson'
import type { Serializer } from './types.js'

/**
 * A serializer built on `superjson`, which round-trips `Date`, `Map` and `Set`.
 * The default for persisted corpus files, where `Document.ingestedAt` is a `Date`.
 */
export class SuperJsonSerializer implements Serializer {
	serialize(data: unknown): string {
		return SuperJSON.stringify(data)
	}

	deserialize(text: string): unknown {
		return SuperJSON.parse<unknown>(text)
	}
}
