/**
 * Vector Store Factory
 */

import type { AppConfig } from '../config/env.js';
import type { Logger } from '../logging/logger.js';
import { QdrantDatabaseAdmin } from './admin.js';
import { createQdrantClient, type QdrantLike } from './qdrant-client.js';
import { QdrantVectorStore } from './qdrant-store.js';
import { InMemoryVectorStore } from './memory-store.js';
import type { VectorStore } from './types.js';

export type VectorStoreBackend = 'qdrant' | 'memory';

export interface CreateVectorStoreOptions {
  backend?: VectorStoreBackend;
  /** Database (collection) name; used by the qdrant backend */
  database: string;
  qdrant?: AppConfig['qdrant'];
  /** Pre-built client, mainly for tests */
  client?: QdrantLike;
  logger?: Logger;
}

function clientFor(options: Pick<CreateVectorStoreOptions, 'qdrant' | 'client'>): QdrantLike {
  return options.client ?? createQdrantClient(options.qdrant ?? {});
}

export function createVectorStore(options: CreateVectorStoreOptions): VectorStore {
  if (options.backend === 'memory') {
    return new InMemoryVectorStore();
  }
  return new QdrantVectorStore(clientFor(options), {
    collectionName: options.database,
    ...(options.qdrant ? { config: options.qdrant } : {}),
    ...(options.logger ? { logger: options.logger } : {}),
  });
}

export function createDatabaseAdmin(
  options: Pick<CreateVectorStoreOptions, 'qdrant' | 'client' | 'logger'> = {}
): QdrantDatabaseAdmin {
  return new QdrantDatabaseAdmin(clientFor(options), options.logger ? { logger: options.logger } : {});
}
