/**
 * Qdrant Vector Store
 *
 * One collection per database. Points carry the chunk payload and are
 * keyed by a UUID v5 of the chunk id, so re-ingesting a document replaces
 * its points in place.
 */

import { v5 as uuidv5 } from 'uuid';

import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';
import {
  QdrantConfigSchema,
  readVectorSize,
  type QdrantConfigInput,
  type QdrantFilter,
  type QdrantLike,
  type QdrantMatchCondition,
} from './qdrant-client.js';
import {
  ChunkPayloadSchema,
  VectorStoreError,
  VectorStoreErrorCode,
  assertDimensions,
  resolveFilterKey,
  BUILT_IN_FILTER_KEYS,
  type ChunkPayload,
  type DocumentSummary,
  type MetadataFilter,
  type StoreMatch,
  type StoreOptions,
  type StoredChunkRecord,
  type VectorStore,
} from './types.js';

/** Namespace for chunk point ids */
export const POINT_ID_NAMESPACE = '6f1c7e2a-4b0d-5d8e-9a3f-2c1b0e7d4a55';

/** Payload fields indexed for filtering */
export const PAYLOAD_INDEX_FIELDS: readonly string[] = ['documentId', 'source'];

export function toPointId(chunkId: string): string {
  return uuidv5(chunkId, POINT_ID_NAMESPACE);
}

/**
 * Build a Qdrant `must` filter from equality conditions
 */
export function buildQdrantFilter(filter: MetadataFilter | undefined): QdrantFilter | undefined {
  if (!filter) {
    return undefined;
  }
  const must: QdrantMatchCondition[] = Object.entries(filter).map(([key, value]) => ({
    key: resolveFilterKey(key),
    // Custom metadata is stored as strings
    match: { value: BUILT_IN_FILTER_KEYS.has(key) ? value : String(value) },
  }));
  return must.length > 0 ? { must } : undefined;
}

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new VectorStoreError('Operation aborted', VectorStoreErrorCode.ABORTED);
  }
}

function parsePayload(payload: unknown, pointId: string | number): ChunkPayload {
  const parsed = ChunkPayloadSchema.safeParse(payload);
  if (!parsed.success) {
    throw new VectorStoreError(
      `Point ${pointId} has an invalid payload: ${parsed.error.issues[0]?.message ?? 'unknown issue'}`,
      VectorStoreErrorCode.INVALID_PAYLOAD
    );
  }
  return parsed.data;
}

export interface QdrantVectorStoreOptions {
  collectionName: string;
  config?: QdrantConfigInput;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const store = new QdrantVectorStore(createQdrantClient({ url }), { collectionName: 'rm0008' });
 * await store.put(records);
 * const matches = await store.search(queryVector, 25, { source: 'rm0008.pdf' });
 * ```
 */
export class QdrantVectorStore implements VectorStore {
  readonly collectionName: string;
  private readonly client: QdrantLike;
  private readonly onDiskPayload: boolean;
  private readonly scrollPageSize: number;
  private readonly logger: Logger;
  /** Vector size once read from, or written to, the collection */
  private dimensions: number | null = null;

  constructor(client: QdrantLike, options: QdrantVectorStoreOptions) {
    const config = QdrantConfigSchema.parse(options.config ?? {});
    this.client = client;
    this.collectionName = options.collectionName;
    this.onDiskPayload = config.onDiskPayload;
    this.scrollPageSize = config.scrollPageSize;
    this.logger = resolveLogger('vector-store:qdrant', options.logger);
  }

  // ===========================================================================
  // Writes
  // ===========================================================================

  async put(records: readonly StoredChunkRecord[], options: StoreOptions = {}): Promise<number> {
    throwIfAborted(options.signal);
    const first = records[0];
    if (!first) {
      return 0;
    }

    const dimensions = (await this.getDimensions()) ?? (await this.createCollection(first.vector.length));
    for (const record of records) {
      assertDimensions(record.vector, dimensions, `Record ${record.chunkId}`);
    }

    const points = records.map(({ vector, ...payload }) => ({
      id: toPointId(payload.chunkId),
      vector: [...vector],
      payload: { ...payload },
    }));

    throwIfAborted(options.signal);
    try {
      await this.client.upsert(this.collectionName, { wait: true, points });
    } catch (error) {
      throw VectorStoreError.fromError(error, `Failed to upsert into ${this.collectionName}`);
    }

    this.logger.debug('Upserted points', { collection: this.collectionName, count: points.length });
    return points.length;
  }

  async deleteDocument(documentId: string, options: StoreOptions = {}): Promise<number> {
    throwIfAborted(options.signal);
    if ((await this.getDimensions()) === null) {
      return 0;
    }

    const filter: QdrantFilter = { must: [{ key: 'documentId', match: { value: documentId } }] };
    try {
      const { count } = await this.client.count(this.collectionName, { filter, exact: true });
      if (count === 0) {
        return 0;
      }
      throwIfAborted(options.signal);
      await this.client.delete(this.collectionName, { wait: true, filter });
      this.logger.debug('Deleted document', { collection: this.collectionName, documentId, count });
      return count;
    } catch (error) {
      throw VectorStoreError.fromError(error, `Failed to delete ${documentId} from ${this.collectionName}`);
    }
  }

  // ===========================================================================
  // Reads
  // ===========================================================================

  async search(
    vector: readonly number[],
    k: number,
    filter?: MetadataFilter,
    options: StoreOptions = {}
  ): Promise<StoreMatch[]> {
    throwIfAborted(options.signal);
    const dimensions = await this.getDimensions();
    if (dimensions === null) {
      throw new VectorStoreError(
        `Database ${this.collectionName} does not exist`,
        VectorStoreErrorCode.COLLECTION_NOT_FOUND
      );
    }
    assertDimensions(vector, dimensions, 'Query');

    const qdrantFilter = buildQdrantFilter(filter);
    let points: Awaited<ReturnType<QdrantLike['search']>>;
    try {
      points = await this.client.search(this.collectionName, {
        vector: [...vector],
        limit: k,
        with_payload: true,
        ...(qdrantFilter ? { filter: qdrantFilter } : {}),
      });
    } catch (error) {
      throw VectorStoreError.fromError(error, `Search failed in ${this.collectionName}`);
    }

    return points.map((point) => ({ score: point.score, payload: parsePayload(point.payload, point.id) }));
  }

  async listDocuments(): Promise<DocumentSummary[]> {
    if ((await this.getDimensions()) === null) {
      return [];
    }

    const summaries = new Map<string, DocumentSummary>();
    let offset: string | number | undefined;
    try {
      do {
        const page = await this.client.scroll(this.collectionName, {
          limit: this.scrollPageSize,
          with_payload: ['documentId', 'source'],
          with_vector: false,
          ...(offset !== undefined ? { offset } : {}),
        });
        for (const point of page.points) {
          const documentId: unknown = point.payload?.['documentId'];
          const source: unknown = point.payload?.['source'];
          if (typeof documentId !== 'string') {
            continue;
          }
          const summary = summaries.get(documentId);
          if (summary) {
            summary.chunkCount++;
          } else {
            summaries.set(documentId, {
              documentId,
              source: typeof source === 'string' ? source : documentId,
              chunkCount: 1,
            });
          }
        }
        const next = page.next_page_offset;
        offset = typeof next === 'string' || typeof next === 'number' ? next : undefined;
      } while (offset !== undefined);
    } catch (error) {
      throw VectorStoreError.fromError(error, `Failed to list documents in ${this.collectionName}`);
    }

    return [...summaries.values()].sort((a, b) => a.documentId.localeCompare(b.documentId));
  }

  async count(): Promise<number> {
    if ((await this.getDimensions()) === null) {
      return 0;
    }
    try {
      const { count } = await this.client.count(this.collectionName, { exact: true });
      return count;
    } catch (error) {
      throw VectorStoreError.fromError(error, `Failed to count points in ${this.collectionName}`);
    }
  }

  /**
   * Vector size of the collection, read once and cached. Null when the
   * collection does not exist yet.
   */
  async getDimensions(): Promise<number | null> {
    if (this.dimensions !== null) {
      return this.dimensions;
    }
    try {
      const { exists } = await this.client.collectionExists(this.collectionName);
      if (!exists) {
        return null;
      }
      const info = await this.client.getCollection(this.collectionName);
      this.dimensions = readVectorSize(info.config.params.vectors);
      return this.dimensions;
    } catch (error) {
      throw VectorStoreError.fromError(error, `Failed to read ${this.collectionName}`);
    }
  }

  private async createCollection(dimensions: number): Promise<number> {
    await createCollectionWithIndexes(this.client, this.collectionName, dimensions, this.onDiskPayload);
    this.logger.info('Created database', { collection: this.collectionName, dimensions });
    this.dimensions = dimensions;
    return dimensions;
  }
}

/**
 * Create a Cosine collection and its payload indexes
 */
export async function createCollectionWithIndexes(
  client: QdrantLike,
  collectionName: string,
  dimensions: number,
  onDiskPayload: boolean
): Promise<void> {
  try {
    await client.createCollection(collectionName, {
      vectors: { size: dimensions, distance: 'Cosine' },
      on_disk_payload: onDiskPayload,
    });
    for (const field of PAYLOAD_INDEX_FIELDS) {
      await client.createPayloadIndex(collectionName, {
        field_name: field,
        field_schema: 'keyword',
        wait: true,
      });
    }
  } catch (error) {
    throw VectorStoreError.fromError(error, `Failed to create ${collectionName}`);
  }
}
