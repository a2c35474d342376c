/**
 * OpenAI Embedding Provider
 *
 * Calls the `/embeddings` endpoint of the OpenAI API, or any service that
 * speaks the same protocol at a different base URL.
 */

import { z } from 'zod';

import { createHttpClient } from '../http/index.js';
import type { HttpClient } from '../http/types.js';
import type { Logger } from '../logging/logger.js';
import { HttpEmbeddingProvider } from './provider.js';
import {
  EmbeddingError,
  EmbeddingErrorCode,
  OpenAIEmbeddingConfigSchema,
  resolveModelDimensions,
  type OpenAIEmbeddingConfigInput,
} from './types.js';

const OpenAIEmbeddingResponseSchema = z.object({
  data: z.array(
    z.object({
      index: z.number().int().nonnegative(),
      embedding: z.array(z.number()),
    })
  ),
});

export interface OpenAIProviderDeps {
  http?: HttpClient;
  logger?: Logger;
}

/**
 * @example
 * ```typescript
 * const provider = new OpenAIEmbeddingProvider({ apiKey: 'sk-...' });
 * const [vector] = await provider.embedDocuments(['AFIO_MAPR remap register']);
 * ```
 */
export class OpenAIEmbeddingProvider extends HttpEmbeddingProvider {
  override readonly name = 'openai';

  constructor(config: OpenAIEmbeddingConfigInput, deps: OpenAIProviderDeps = {}) {
    const parsed = OpenAIEmbeddingConfigSchema.parse(config);
    super(
      {
        model: parsed.model,
        dimensions: resolveModelDimensions(parsed.model, parsed.dimensions),
        batchSize: parsed.batchSize,
        retry: parsed.retry,
        http:
          deps.http ??
          createHttpClient({
            baseURL: parsed.baseUrl,
            timeout: parsed.timeout,
            headers: { Authorization: `Bearer ${parsed.apiKey}` },
          }),
        logger: deps.logger,
      },
      'embeddings:openai'
    );
  }

  protected override async requestBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.http.post(
      '/embeddings',
      { model: this.model, input: texts, encoding_format: 'float' },
      signal ? { signal } : {}
    );

    const parsed = OpenAIEmbeddingResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Unexpected embeddings response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        EmbeddingErrorCode.INVALID_RESPONSE
      );
    }

    return [...parsed.data.data].sort((a, b) => a.index - b.index).map((item) => item.embedding);
  }
}
