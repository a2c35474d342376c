/**
 * Ingestion Service
 *
 * Chunks a document, embeds every chunk, then replaces the document's
 * previous chunks in the store with the new ones. A failed embedding leaves
 * the stored version untouched. Re-ingesting the same document is
 * idempotent: chunk ids, and so point ids, are deterministic.
 */

import { basename, extname } from 'node:path';

import { chunkDocument } from '../chunking/chunker.js';
import type { TokenCounter } from '../chunking/token-counter.js';
import type { Chunk } from '../chunking/types.js';
import type { PipelineConfig } from '../config/types.js';
import { createDefaultPipelineConfig } from '../config/types.js';
import { EmbeddingError, EmbeddingErrorCode, type EmbeddingProvider } from '../embeddings/types.js';
import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';
import type { StoredChunkRecord, VectorStore } from '../vector-store/types.js';
import { FileDocumentReader, type DocumentReader, type ExtractedDocument } from './document-reader.js';

// =============================================================================
// Types
// =============================================================================

export const IngestStatus = {
  INGESTED: 'ingested',
  NO_CONTENT: 'no_content',
} as const;

export type IngestStatus = (typeof IngestStatus)[keyof typeof IngestStatus];

export const IngestProgressStage = {
  EMBEDDING: 'embedding',
  DOCUMENT: 'document',
} as const;

export type IngestProgressStage = (typeof IngestProgressStage)[keyof typeof IngestProgressStage];

export type IngestProgressEvent =
  | {
      stage: typeof IngestProgressStage.EMBEDDING;
      documentId: string;
      /** 1-based */
      batch: number;
      totalBatches: number;
      chunksEmbedded: number;
      totalChunks: number;
    }
  | {
      stage: typeof IngestProgressStage.DOCUMENT;
      documentId: string;
      result: IngestResult;
    };

export interface IngestOptions {
  /** Defaults to the file name without its extension */
  documentId?: string;
  /** Stored on every chunk and usable as a search filter */
  metadata?: Record<string, string>;
  signal?: AbortSignal;
  /** Called after each embedding batch and once the document is stored */
  onProgress?: (event: IngestProgressEvent) => void;
}

export interface IngestResult {
  status: IngestStatus;
  documentId: string;
  source: string;
  chunksWritten: number;
  /** Chunks removed from a previous ingestion of the same document */
  chunksReplaced: number;
  sectionsDropped: number;
  warnings: string[];
  durationMs: number;
}

export interface IngestionServiceOptions {
  embedder: EmbeddingProvider;
  store: VectorStore;
  config?: Readonly<PipelineConfig>;
  reader?: DocumentReader;
  counter?: TokenCounter;
  logger?: Logger;
}

// =============================================================================
// Helpers
// =============================================================================

export function defaultDocumentId(filePath: string): string {
  const name = basename(filePath);
  return name.slice(0, name.length - extname(name).length) || name;
}

export function toStoredRecord(chunk: Chunk, vector: number[]): StoredChunkRecord {
  return {
    chunkId: chunk.id,
    documentId: chunk.documentId,
    chunkIndex: chunk.chunkIndex,
    text: chunk.text,
    source: chunk.source,
    page: chunk.page,
    section: chunk.section,
    sectionPath: chunk.sectionPath,
    kind: chunk.kind,
    metadata: { ...chunk.metadata },
    vector,
  };
}

function batches<T>(items: readonly T[], size: number): T[][] {
  const result: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    result.push(items.slice(i, i + size));
  }
  return result;
}

// =============================================================================
// Service
// =============================================================================

/**
 * @example
 * ```typescript
 * const ingestion = new IngestionService({ embedder, store });
 * const result = await ingestion.ingestFile('manuals/rm0008.pdf', { metadata: { family: 'f1' } });
 * console.log(`${result.documentId}: ${result.chunksWritten} chunks`);
 * ```
 */
export class IngestionService {
  private readonly embedder: EmbeddingProvider;
  private readonly store: VectorStore;
  private readonly config: Readonly<PipelineConfig>;
  private readonly reader: DocumentReader;
  private readonly counter: TokenCounter | undefined;
  private readonly logger: Logger;

  constructor(options: IngestionServiceOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
    this.config = options.config ?? createDefaultPipelineConfig();
    this.logger = resolveLogger('ingest', options.logger);
    this.reader = options.reader ?? new FileDocumentReader({ logger: this.logger });
    this.counter = options.counter;
  }

  async ingestFile(filePath: string, options: IngestOptions = {}): Promise<IngestResult> {
    const extracted = await this.reader.read(filePath);
    return this.ingestDocument(extracted, options);
  }

  async ingestDocument(extracted: ExtractedDocument, options: IngestOptions = {}): Promise<IngestResult> {
    const startTime = Date.now();
    const { signal } = options;
    const storeOptions = signal ? { signal } : {};
    const documentId = options.documentId ?? defaultDocumentId(extracted.path);
    const source = basename(extracted.path);

    const chunking = chunkDocument({
      documentId,
      source,
      document: extracted.document,
      metadata: options.metadata ?? {},
      config: this.config.chunking,
      ...(this.counter ? { counter: this.counter } : {}),
      logger: this.logger,
    });

    const base = {
      documentId,
      source,
      sectionsDropped: chunking.stats.sectionsDropped,
      warnings: chunking.warnings,
    };

    if (chunking.chunks.length === 0) {
      const chunksReplaced = await this.store.deleteDocument(documentId, storeOptions);
      this.logger.warn('No content to ingest', { documentId, source });
      return this.finish(options, {
        ...base,
        status: IngestStatus.NO_CONTENT,
        chunksWritten: 0,
        chunksReplaced,
        durationMs: Date.now() - startTime,
      });
    }

    const records = await this.embedChunks(documentId, chunking.chunks, options);

    const chunksReplaced = await this.store.deleteDocument(documentId, storeOptions);
    let chunksWritten = 0;
    for (const batch of batches(records, this.config.upsertBatchSize)) {
      chunksWritten += await this.store.put(batch, storeOptions);
    }

    const durationMs = Date.now() - startTime;
    this.logger.info('Ingested document', {
      documentId,
      source,
      chunks: chunksWritten,
      replaced: chunksReplaced,
      sectionsDropped: base.sectionsDropped,
      durationMs,
    });

    return this.finish(options, {
      ...base,
      status: IngestStatus.INGESTED,
      chunksWritten,
      chunksReplaced,
      durationMs,
    });
  }

  private async embedChunks(
    documentId: string,
    chunks: readonly Chunk[],
    options: IngestOptions
  ): Promise<StoredChunkRecord[]> {
    const embedOptions = options.signal ? { signal: options.signal } : {};
    const groups = batches(chunks, this.config.embeddingBatchSize);
    const records: StoredChunkRecord[] = [];

    for (const [index, batch] of groups.entries()) {
      const vectors = await this.embedder.embedDocuments(
        batch.map((chunk) => chunk.text),
        embedOptions
      );
      if (vectors.length !== batch.length) {
        throw new EmbeddingError(
          `${this.embedder.name} returned ${vectors.length} embeddings for ${batch.length} chunks`,
          EmbeddingErrorCode.INVALID_RESPONSE
        );
      }
      batch.forEach((chunk, i) => {
        const vector = vectors[i];
        if (vector) {
          records.push(toStoredRecord(chunk, vector));
        }
      });

      this.logger.debug('Embedded batch', { documentId, batch: index + 1, of: groups.length });
      options.onProgress?.({
        stage: IngestProgressStage.EMBEDDING,
        documentId,
        batch: index + 1,
        totalBatches: groups.length,
        chunksEmbedded: records.length,
        totalChunks: chunks.length,
      });
    }
    return records;
  }

  private finish(options: IngestOptions, result: IngestResult): IngestResult {
    options.onProgress?.({ stage: IngestProgressStage.DOCUMENT, documentId: result.documentId, result });
    return result;
  }
}
