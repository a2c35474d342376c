/**
 * Cross-Encoder Reranker
 *
 * Scores pairs with a cross-encoder served by a local text-embeddings-inference
 * server (`POST /rerank`). The `local` backend serves ms-marco MiniLM and the
 * `bge` backend serves bge-reranker-v2-m3.
 */

import { z } from 'zod';

import { createHttpClient } from '../http/index.js';
import { withRetry } from '../http/retry.js';
import type { HttpClient } from '../http/types.js';
import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';
import {
  CROSS_ENCODER_MODELS,
  CrossEncoderConfigSchema,
  RerankError,
  RerankErrorCode,
  scoresByIndex,
  type CrossEncoderConfig,
  type CrossEncoderConfigInput,
  type RerankOptions,
  type Reranker,
} from './types.js';

const RerankResponseSchema = z.array(
  z.object({
    index: z.number().int(),
    score: z.number(),
  })
);

export class CrossEncoderReranker implements Reranker {
  readonly backend: 'local' | 'bge';
  /** Model the server is expected to serve */
  readonly model: string;
  private readonly config: CrossEncoderConfig;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(config: CrossEncoderConfigInput, deps: { http?: HttpClient; logger?: Logger } = {}) {
    this.config = CrossEncoderConfigSchema.parse(config);
    this.backend = this.config.backend;
    this.model = CROSS_ENCODER_MODELS[this.backend];
    this.http = deps.http ?? createHttpClient({ baseURL: this.config.url, timeout: this.config.timeout });
    this.logger = resolveLogger(`rerank:${this.backend}`, deps.logger);
  }

  async score(query: string, texts: string[], options: RerankOptions = {}): Promise<number[]> {
    if (texts.length === 0) {
      return [];
    }
    const { signal } = options;

    let body: unknown;
    try {
      const response = await withRetry(
        () => this.http.post('/rerank', { query, texts, raw_scores: false }, signal ? { signal } : {}),
        {
          config: this.config.retry,
          ...(signal ? { signal } : {}),
          logger: this.logger,
          operation: `${this.backend} rerank`,
        }
      );
      body = response.data;
    } catch (error) {
      throw RerankError.fromError(error, this.backend);
    }

    const parsed = RerankResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RerankError(
        `Unexpected response from ${this.config.url}/rerank`,
        RerankErrorCode.INVALID_RESPONSE,
        this.backend
      );
    }

    this.logger.debug('Reranked candidates', { count: texts.length, model: this.model });
    return scoresByIndex(parsed.data, texts.length, this.backend);
  }
}
