/**
 * techdoc-rag - Shared Library
 *
 * Chunking, annotation, storage and hybrid search for register-heavy
 * technical reference manuals.
 */

// Logging
export * from './logging/index.js';

// Configuration
export * from './config/index.js';

// HTTP (client, failure classification, retry)
export * from './http/index.js';

// Chunking (normalize, split, classify, annotate, stitch)
export * from './chunking/index.js';

// Embeddings (OpenAI-compatible and Ollama providers)
export * from './embeddings/index.js';

// Vector Store (Qdrant and in-memory)
export * from './vector-store/index.js';

// Rerank (Cohere and cross-encoder services)
export * from './rerank/index.js';

// Search (hybrid refinement)
export * from './search/index.js';

// Ingest (document reading and ingestion)
export * from './ingest/index.js';

// Progress (batch progress reporting)
export * from './progress/index.js';
