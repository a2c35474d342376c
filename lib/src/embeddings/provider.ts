/**
 * Base Embedding Provider
 *
 * Abstract base for embedding services reached over HTTP. Subclasses send
 * one batch; the base class splits input, retries transient failures,
 * validates dimensions and wraps errors.
 */

import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';
import { withRetry } from '../http/retry.js';
import type { HttpClient, RetryConfig } from '../http/types.js';
import { validateEmbeddingDimensions } from './dimension-validation.js';
import {
  EmbeddingError,
  EmbeddingErrorCode,
  type EmbedOptions,
  type EmbeddingProvider,
} from './types.js';

export interface BaseProviderSettings {
  model: string;
  dimensions: number;
  batchSize: number;
  retry: RetryConfig;
  http: HttpClient;
  logger?: Logger | undefined;
}

export abstract class HttpEmbeddingProvider implements EmbeddingProvider {
  abstract readonly name: string;
  readonly model: string;
  readonly dimensions: number;

  protected readonly http: HttpClient;
  protected readonly logger: Logger;
  private readonly batchSize: number;
  private readonly retry: RetryConfig;

  protected constructor(settings: BaseProviderSettings, source: string) {
    this.model = settings.model;
    this.dimensions = settings.dimensions;
    this.batchSize = settings.batchSize;
    this.retry = settings.retry;
    this.http = settings.http;
    this.logger = resolveLogger(source, settings.logger);
  }

  /**
   * Send one batch and return its vectors in input order
   */
  protected abstract requestBatch(texts: string[], signal?: AbortSignal): Promise<number[][]>;

  async embedDocuments(texts: string[], options: EmbedOptions = {}): Promise<number[][]> {
    const { signal } = options;
    const vectors: number[][] = [];

    for (let start = 0; start < texts.length; start += this.batchSize) {
      const batch = texts.slice(start, start + this.batchSize);
      const batchVectors = await this.embedBatch(batch, signal);
      vectors.push(...batchVectors);
    }

    this.logger.debug('Embedded texts', { count: texts.length, model: this.model });
    return vectors;
  }

  async embedQuery(text: string, options: EmbedOptions = {}): Promise<number[]> {
    const [vector] = await this.embedBatch([text], options.signal);
    if (!vector) {
      throw new EmbeddingError('No embedding returned for query', EmbeddingErrorCode.INVALID_RESPONSE);
    }
    return vector;
  }

  private async embedBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    let vectors: number[][];
    try {
      vectors = await withRetry(() => this.requestBatch(texts, signal), {
        config: this.retry,
        ...(signal ? { signal } : {}),
        logger: this.logger,
        operation: `${this.name} embeddings`,
      });
    } catch (error) {
      throw EmbeddingError.fromError(error, `${this.name} embedding request failed`);
    }

    if (vectors.length !== texts.length) {
      throw new EmbeddingError(
        `Expected ${texts.length} embeddings, received ${vectors.length}`,
        EmbeddingErrorCode.INVALID_RESPONSE
      );
    }
    validateEmbeddingDimensions(vectors, this.dimensions);
    return vectors;
  }
}
