/**
 * In-Memory Vector Store
 *
 * Linear cosine scan over a Map. Used by tests and small local corpora.
 */

import { cosineSimilarity } from '../embeddings/types.js';
import {
  VectorStoreError,
  VectorStoreErrorCode,
  assertDimensions,
  type ChunkPayload,
  type DocumentSummary,
  type MetadataFilter,
  type StoreMatch,
  type StoreOptions,
  type StoredChunkRecord,
  type VectorStore,
  BUILT_IN_FILTER_KEYS,
} from './types.js';

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new VectorStoreError('Operation aborted', VectorStoreErrorCode.ABORTED);
  }
}

export function matchesFilter(payload: ChunkPayload, filter: MetadataFilter | undefined): boolean {
  if (!filter) {
    return true;
  }
  return Object.entries(filter).every(([key, expected]) => {
    if (BUILT_IN_FILTER_KEYS.has(key)) {
      return Reflect.get(payload, key) === expected;
    }
    return payload.metadata[key] === String(expected);
  });
}

function toPayload(record: StoredChunkRecord): ChunkPayload {
  const { vector: _vector, ...payload } = record;
  return { ...payload, metadata: { ...payload.metadata } };
}

export class InMemoryVectorStore implements VectorStore {
  private readonly records = new Map<string, StoredChunkRecord>();
  private dimensions: number | null;

  /**
   * @param dimensions - Lock the vector length up front instead of on first write
   */
  constructor(dimensions?: number) {
    this.dimensions = dimensions ?? null;
  }

  async put(records: readonly StoredChunkRecord[], options: StoreOptions = {}): Promise<number> {
    throwIfAborted(options.signal);

    for (const record of records) {
      if (this.dimensions === null) {
        this.dimensions = record.vector.length;
      }
      assertDimensions(record.vector, this.dimensions, `Record ${record.chunkId}`);
    }
    for (const record of records) {
      this.records.set(record.chunkId, { ...record, vector: [...record.vector] });
    }
    return records.length;
  }

  async search(
    vector: readonly number[],
    k: number,
    filter?: MetadataFilter,
    options: StoreOptions = {}
  ): Promise<StoreMatch[]> {
    throwIfAborted(options.signal);
    if (this.dimensions === null) {
      return [];
    }
    assertDimensions(vector, this.dimensions, 'Query');

    const matches: StoreMatch[] = [];
    for (const record of this.records.values()) {
      if (matchesFilter(record, filter)) {
        matches.push({ score: cosineSimilarity(vector, record.vector), payload: toPayload(record) });
      }
    }
    // Array.prototype.sort is stable, so equal scores keep insertion order
    matches.sort((a, b) => b.score - a.score);
    return matches.slice(0, k);
  }

  async deleteDocument(documentId: string, options: StoreOptions = {}): Promise<number> {
    throwIfAborted(options.signal);
    let removed = 0;
    for (const [id, record] of this.records) {
      if (record.documentId === documentId) {
        this.records.delete(id);
        removed++;
      }
    }
    return removed;
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    const summaries = new Map<string, DocumentSummary>();
    for (const record of this.records.values()) {
      const summary = summaries.get(record.documentId);
      if (summary) {
        summary.chunkCount++;
      } else {
        summaries.set(record.documentId, {
          documentId: record.documentId,
          source: record.source,
          chunkCount: 1,
        });
      }
    }
    return [...summaries.values()];
  }

  async count(): Promise<number> {
    return this.records.size;
  }

  async getDimensions(): Promise<number | null> {
    return this.dimensions;
  }
}
