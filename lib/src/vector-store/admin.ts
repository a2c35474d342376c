/**
 * Qdrant Database Administration
 *
 * Create, list and delete the collections that back named databases.
 */

import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';
import { DatabaseNameSchema, type QdrantLike } from './qdrant-client.js';
import { createCollectionWithIndexes } from './qdrant-store.js';
import { VectorStoreError, VectorStoreErrorCode } from './types.js';

export interface DatabaseInfo {
  name: string;
  pointCount: number;
}

export function validateDatabaseName(name: string): string {
  const parsed = DatabaseNameSchema.safeParse(name);
  if (!parsed.success) {
    throw new VectorStoreError(
      `Invalid database name "${name}": ${parsed.error.issues[0]?.message ?? 'invalid'}`,
      VectorStoreErrorCode.INVALID_NAME
    );
  }
  return parsed.data;
}

export class QdrantDatabaseAdmin {
  private readonly client: QdrantLike;
  private readonly logger: Logger;
  private readonly onDiskPayload: boolean;

  constructor(client: QdrantLike, options: { logger?: Logger; onDiskPayload?: boolean } = {}) {
    this.client = client;
    this.logger = resolveLogger('vector-store:admin', options.logger);
    this.onDiskPayload = options.onDiskPayload ?? true;
  }

  /**
   * @throws {VectorStoreError} COLLECTION_EXISTS when the name is taken
   */
  async createDatabase(name: string, dimensions: number): Promise<void> {
    const collection = validateDatabaseName(name);
    if (await this.exists(collection)) {
      throw new VectorStoreError(
        `Database ${collection} already exists`,
        VectorStoreErrorCode.COLLECTION_EXISTS
      );
    }
    await createCollectionWithIndexes(this.client, collection, dimensions, this.onDiskPayload);
    this.logger.info('Created database', { name: collection, dimensions });
  }

  async listDatabases(): Promise<DatabaseInfo[]> {
    try {
      const { collections } = await this.client.getCollections();
      const databases: DatabaseInfo[] = [];
      for (const { name } of collections) {
        const info = await this.client.getCollection(name);
        databases.push({ name, pointCount: info.points_count ?? 0 });
      }
      return databases.sort((a, b) => a.name.localeCompare(b.name));
    } catch (error) {
      throw VectorStoreError.fromError(error, 'Failed to list databases');
    }
  }

  /**
   * @throws {VectorStoreError} COLLECTION_NOT_FOUND
   */
  async deleteDatabase(name: string): Promise<void> {
    if (!(await this.exists(name))) {
      throw new VectorStoreError(`Database ${name} does not exist`, VectorStoreErrorCode.COLLECTION_NOT_FOUND);
    }
    try {
      await this.client.deleteCollection(name);
    } catch (error) {
      throw VectorStoreError.fromError(error, `Failed to delete ${name}`);
    }
    this.logger.info('Deleted database', { name });
  }

  async exists(name: string): Promise<boolean> {
    try {
      const { exists } = await this.client.collectionExists(name);
      return exists;
    } catch (error) {
      throw VectorStoreError.fromError(error, `Failed to look up ${name}`);
    }
  }
}
