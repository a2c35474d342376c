/**
 * Qdrant Client
 *
 * Client construction plus the subset of the REST client the stores call.
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { z } from 'zod';

// =============================================================================
// Configuration
// =============================================================================

export const QdrantConfigSchema = z.object({
  url: z.string().url().default('http://localhost:6333'),
  apiKey: z.string().optional(),
  /** Request timeout in milliseconds */
  timeout: z.number().int().positive().default(30000),
  /** Keep payloads on disk rather than in RAM */
  onDiskPayload: z.boolean().default(true),
  /** Points per scroll page when listing documents */
  scrollPageSize: z.number().int().positive().default(256),
});

export type QdrantConfig = z.infer<typeof QdrantConfigSchema>;

export type QdrantConfigInput = z.input<typeof QdrantConfigSchema>;

/**
 * Database names double as collection names
 */
export const DatabaseNameSchema = z
  .string()
  .min(1)
  .max(255)
  .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'Database names may contain letters, digits, "_" and "-"');

// =============================================================================
// Client Surface
// =============================================================================

export interface QdrantMatchCondition {
  key: string;
  match: { value: string | number | boolean };
}

export interface QdrantFilter {
  must: QdrantMatchCondition[];
}

export interface QdrantPoint {
  id: string | number;
  payload?: Record<string, unknown> | null;
}

/**
 * The QdrantClient methods the stores use. `QdrantClient` satisfies it;
 * tests pass objects of mocked methods.
 */
export interface QdrantLike {
  collectionExists(collectionName: string): Promise<{ exists: boolean }>;
  getCollections(): Promise<{ collections: Array<{ name: string }> }>;
  getCollection(collectionName: string): Promise<{
    points_count?: number | null;
    config: { params: { vectors?: unknown } };
  }>;
  createCollection(
    collectionName: string,
    args: { vectors: { size: number; distance: 'Cosine' }; on_disk_payload?: boolean }
  ): Promise<boolean>;
  deleteCollection(collectionName: string): Promise<boolean>;
  createPayloadIndex(
    collectionName: string,
    args: { field_name: string; field_schema: 'keyword'; wait?: boolean }
  ): Promise<unknown>;
  upsert(
    collectionName: string,
    args: {
      wait?: boolean;
      points: Array<{ id: string; vector: number[]; payload: Record<string, unknown> }>;
    }
  ): Promise<unknown>;
  search(
    collectionName: string,
    args: { vector: number[]; limit: number; filter?: QdrantFilter; with_payload: boolean }
  ): Promise<Array<QdrantPoint & { score: number }>>;
  count(collectionName: string, args: { filter?: QdrantFilter; exact?: boolean }): Promise<{ count: number }>;
  delete(collectionName: string, args: { wait?: boolean; filter: QdrantFilter }): Promise<unknown>;
  scroll(
    collectionName: string,
    args: {
      limit: number;
      offset?: string | number;
      with_payload: string[];
      with_vector: boolean;
    }
  ): Promise<{ points: QdrantPoint[]; next_page_offset?: unknown }>;
}

/**
 * Creates a new Qdrant client with the provided configuration.
 */
export function createQdrantClient(config: QdrantConfigInput = {}): QdrantClient {
  const parsed = QdrantConfigSchema.parse(config);
  return new QdrantClient({
    url: parsed.url,
    ...(parsed.apiKey ? { apiKey: parsed.apiKey } : {}),
    timeout: parsed.timeout,
  });
}

/**
 * Vector size of a collection with a single unnamed vector
 */
export function readVectorSize(vectors: unknown): number | null {
  if (vectors !== null && typeof vectors === 'object') {
    const size: unknown = Reflect.get(vectors, 'size');
    if (typeof size === 'number') {
      return size;
    }
  }
  return null;
}
