/**
 * Ingest Module
 *
 * Reads manuals from disk and writes their annotated chunks to a vector
 * store.
 *
 * @example
 * ```typescript
 * import { IngestionService, createEmbeddingProvider, createVectorStore } from '@techdoc-rag/lib';
 *
 * const ingestion = new IngestionService({
 *   embedder: createEmbeddingProvider(config.embedding),
 *   store: createVectorStore({ database: 'rm0008', qdrant: config.qdrant }),
 * });
 * await ingestion.ingestFile('manuals/rm0008.pdf');
 * ```
 */

export {
  DocumentFormat,
  DocumentFormatSchema,
  DocumentReadError,
  DocumentReadErrorCode,
  DocumentReadErrorCodeSchema,
  FileDocumentReader,
  SUPPORTED_EXTENSIONS,
  assemblePageText,
  detectFormat,
  isDocumentReadError,
  type DocumentReader,
  type ExtractedDocument,
  type FileDocumentReaderOptions,
  type PositionedText,
} from './document-reader.js';

export {
  IngestProgressStage,
  IngestStatus,
  IngestionService,
  defaultDocumentId,
  toStoredRecord,
  type IngestOptions,
  type IngestProgressEvent,
  type IngestResult,
  type IngestionServiceOptions,
} from './ingestion-service.js';
