/**
 * Vector Store Module
 *
 * @example
 * ```typescript
 * import { createVectorStore, createDatabaseAdmin, loadAppConfig } from '@techdoc-rag/lib';
 *
 * const config = loadAppConfig();
 * await createDatabaseAdmin({ qdrant: config.qdrant }).createDatabase('rm0008', 1536);
 *
 * const store = createVectorStore({ database: 'rm0008', qdrant: config.qdrant });
 * const matches = await store.search(vector, 25, { kind: 'register_definition' });
 * ```
 */

export {
  ChunkPayloadSchema,
  type ChunkPayload,
  type StoredChunkRecord,
  type StoreMatch,
  type DocumentSummary,
  type MetadataValue,
  type MetadataFilter,
  BUILT_IN_FILTER_KEYS,
  resolveFilterKey,
  type StoreOptions,
  type VectorStore,
  VectorStoreErrorCode,
  VectorStoreErrorCodeSchema,
  VectorStoreError,
  isVectorStoreError,
  assertDimensions,
} from './types.js';

export {
  QdrantConfigSchema,
  type QdrantConfig,
  type QdrantConfigInput,
  DatabaseNameSchema,
  type QdrantLike,
  type QdrantFilter,
  type QdrantMatchCondition,
  type QdrantPoint,
  createQdrantClient,
  readVectorSize,
} from './qdrant-client.js';

export {
  QdrantVectorStore,
  type QdrantVectorStoreOptions,
  POINT_ID_NAMESPACE,
  PAYLOAD_INDEX_FIELDS,
  toPointId,
  buildQdrantFilter,
  createCollectionWithIndexes,
} from './qdrant-store.js';

export { InMemoryVectorStore, matchesFilter } from './memory-store.js';

export { QdrantDatabaseAdmin, validateDatabaseName, type DatabaseInfo } from './admin.js';

export {
  createVectorStore,
  createDatabaseAdmin,
  type VectorStoreBackend,
  type CreateVectorStoreOptions,
} from './factory.js';
