/**
 * Vector Store Types
 *
 * The persistence contract for annotated chunks and their vectors, shared
 * by the Qdrant-backed store and the in-memory store.
 */

import { z } from 'zod';

import { ChunkKindSchema } from '../chunking/types.js';

// =============================================================================
// Records
// =============================================================================

export const ChunkPayloadSchema = z.object({
  /** Chunk id, `${documentId}_chunk_${chunkIndex}` */
  chunkId: z.string().min(1),
  documentId: z.string().min(1),
  chunkIndex: z.number().int().nonnegative(),
  text: z.string(),
  source: z.string(),
  page: z.number().int().positive().optional(),
  section: z.string().optional(),
  sectionPath: z.string().optional(),
  kind: ChunkKindSchema,
  metadata: z.record(z.string()).default({}),
});

/**
 * Everything persisted next to a vector
 */
export type ChunkPayload = z.infer<typeof ChunkPayloadSchema>;

export interface StoredChunkRecord extends ChunkPayload {
  vector: number[];
}

export interface StoreMatch {
  /** Similarity, higher is closer */
  score: number;
  payload: ChunkPayload;
}

export interface DocumentSummary {
  documentId: string;
  source: string;
  chunkCount: number;
}

// =============================================================================
// Filters
// =============================================================================

export type MetadataValue = string | number | boolean;

/**
 * Equality conditions, all of which must hold
 */
export type MetadataFilter = Readonly<Record<string, MetadataValue>>;

/**
 * Filter keys stored at the top level of the payload; any other key is
 * looked up under `metadata`.
 */
export const BUILT_IN_FILTER_KEYS: ReadonlySet<string> = new Set([
  'source',
  'page',
  'section',
  'documentId',
  'kind',
]);

export function resolveFilterKey(key: string): string {
  return BUILT_IN_FILTER_KEYS.has(key) ? key : `metadata.${key}`;
}

// =============================================================================
// Store Contract
// =============================================================================

export interface StoreOptions {
  signal?: AbortSignal;
}

export interface VectorStore {
  /**
   * Insert or replace records by chunk id
   *
   * @returns number of records written
   */
  put(records: readonly StoredChunkRecord[], options?: StoreOptions): Promise<number>;
  /** Top `k` matches by descending similarity */
  search(
    vector: readonly number[],
    k: number,
    filter?: MetadataFilter,
    options?: StoreOptions
  ): Promise<StoreMatch[]>;
  /** @returns number of records removed */
  deleteDocument(documentId: string, options?: StoreOptions): Promise<number>;
  listDocuments(): Promise<DocumentSummary[]>;
  count(): Promise<number>;
  /** Vector length the store holds, or null while empty and unconfigured */
  getDimensions(): Promise<number | null>;
}

// =============================================================================
// Error Types
// =============================================================================

export const VectorStoreErrorCode = {
  /** Failed to connect to the store */
  CONNECTION_ERROR: 'CONNECTION_ERROR',
  /** Database (collection) does not exist */
  COLLECTION_NOT_FOUND: 'COLLECTION_NOT_FOUND',
  /** Database (collection) already exists */
  COLLECTION_EXISTS: 'COLLECTION_EXISTS',
  /** Vector length differs from the store's */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Database name is not a valid collection name */
  INVALID_NAME: 'INVALID_NAME',
  /** Stored payload did not have the expected shape */
  INVALID_PAYLOAD: 'INVALID_PAYLOAD',
  TIMEOUT: 'TIMEOUT',
  ABORTED: 'ABORTED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type VectorStoreErrorCode = (typeof VectorStoreErrorCode)[keyof typeof VectorStoreErrorCode];

export const VectorStoreErrorCodeSchema = z.enum([
  'CONNECTION_ERROR',
  'COLLECTION_NOT_FOUND',
  'COLLECTION_EXISTS',
  'DIMENSION_MISMATCH',
  'INVALID_NAME',
  'INVALID_PAYLOAD',
  'TIMEOUT',
  'ABORTED',
  'UNKNOWN',
]);

/**
 * Custom error class for vector store operations
 */
export class VectorStoreError extends Error {
  readonly code: VectorStoreErrorCode;
  override readonly cause: Error | undefined;

  constructor(message: string, code: VectorStoreErrorCode, options?: { cause?: Error }) {
    super(message);
    this.name = 'VectorStoreError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, VectorStoreError);
    }
  }

  /**
   * Wrap an unknown error, detecting the code from its message
   */
  static fromError(error: unknown, context: string): VectorStoreError {
    if (error instanceof VectorStoreError) {
      return error;
    }

    const message = error instanceof Error ? error.message : String(error);
    const cause = error instanceof Error ? error : undefined;
    const lower = message.toLowerCase();

    let code: VectorStoreErrorCode = VectorStoreErrorCode.UNKNOWN;
    if (error instanceof Error && error.name === 'AbortError') {
      code = VectorStoreErrorCode.ABORTED;
    } else if (lower.includes('timeout')) {
      code = VectorStoreErrorCode.TIMEOUT;
    } else if (
      lower.includes('econnrefused') ||
      lower.includes('fetch failed') ||
      lower.includes('connection')
    ) {
      code = VectorStoreErrorCode.CONNECTION_ERROR;
    } else if (lower.includes('not found') || lower.includes("doesn't exist")) {
      code = VectorStoreErrorCode.COLLECTION_NOT_FOUND;
    } else if (lower.includes('dimension')) {
      code = VectorStoreErrorCode.DIMENSION_MISMATCH;
    }

    return new VectorStoreError(`${context}: ${message}`, code, cause ? { cause } : undefined);
  }
}

export function isVectorStoreError(error: unknown): error is VectorStoreError {
  return error instanceof VectorStoreError;
}

/**
 * @throws {VectorStoreError} DIMENSION_MISMATCH
 */
export function assertDimensions(
  vector: readonly number[],
  expected: number,
  context: string
): void {
  if (vector.length !== expected) {
    throw new VectorStoreError(
      `${context}: vector has ${vector.length} dimensions, store holds ${expected}`,
      VectorStoreErrorCode.DIMENSION_MISMATCH
    );
  }
}
