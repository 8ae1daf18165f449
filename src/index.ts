// Corpus
export * from './corpus.js'
export * from './chunker.js'
export * from './retriever.js'
export * from './context-assembler.js'
export * from './config.js'
export * from './errors.js'
export * from './logger.js'
export * from './serializer.js'
export * from './types.js'

// Vector index
export * from './vector-index/index.js'

// Embeddings
export * from './embeddings/hashing.js'
export * from './embeddings/openai.js'
export * from './embeddings/resilient.js'

// Generation
export * from './generation/directives.js'
export * from './generation/format.js'
export * from './generation/openai.js'
export * from './generation/orchestrator.js'
export * from './generation/parsers.js'

// Ingestion
export * from './ingest/extractors.js'
export * from './ingest/files.js'
export * from './ingest/ingestor.js'

// Stores
export * from './store/file.js'
export * from './store/memory.js'
export * from './store/sqlite.js'

// Utils
export * from './utils/batch.js'
export * from './utils/retry.js'
export * from './utils/text.js'
