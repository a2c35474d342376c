/**
 * Cohere Reranker
 *
 * Calls `POST /v2/rerank` and returns relevance scores in input order.
 */

import { z } from 'zod';

import { createHttpClient } from '../http/index.js';
import { withRetry } from '../http/retry.js';
import type { HttpClient } from '../http/types.js';
import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';
import {
  CohereRerankConfigSchema,
  RerankBackend,
  RerankError,
  RerankErrorCode,
  scoresByIndex,
  type CohereRerankConfig,
  type CohereRerankConfigInput,
  type RerankOptions,
  type Reranker,
} from './types.js';

const CohereRerankResponseSchema = z.object({
  results: z.array(
    z.object({
      index: z.number().int(),
      relevance_score: z.number(),
    })
  ),
});

export class CohereReranker implements Reranker {
  readonly backend = RerankBackend.COHERE;
  private readonly config: CohereRerankConfig;
  private readonly http: HttpClient;
  private readonly logger: Logger;

  constructor(config: CohereRerankConfigInput, deps: { http?: HttpClient; logger?: Logger } = {}) {
    this.config = CohereRerankConfigSchema.parse(config);
    this.http =
      deps.http ??
      createHttpClient({
        baseURL: this.config.baseUrl,
        timeout: this.config.timeout,
        headers: { Authorization: `Bearer ${this.config.apiKey}` },
      });
    this.logger = resolveLogger('rerank:cohere', deps.logger);
  }

  async score(query: string, texts: string[], options: RerankOptions = {}): Promise<number[]> {
    if (texts.length === 0) {
      return [];
    }
    const { signal } = options;

    let body: unknown;
    try {
      const response = await withRetry(
        () =>
          this.http.post(
            '/v2/rerank',
            { model: this.config.model, query, documents: texts, top_n: texts.length },
            signal ? { signal } : {}
          ),
        { config: this.config.retry, ...(signal ? { signal } : {}), logger: this.logger, operation: 'cohere rerank' }
      );
      body = response.data;
    } catch (error) {
      throw RerankError.fromError(error, this.backend);
    }

    const parsed = CohereRerankResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RerankError('Unexpected Cohere rerank response', RerankErrorCode.INVALID_RESPONSE, this.backend);
    }

    this.logger.debug('Reranked candidates', { count: texts.length, model: this.config.model });
    return scoresByIndex(
      parsed.data.results.map((r) => ({ index: r.index, score: r.relevance_score })),
      texts.length,
      this.backend
    );
  }
}
