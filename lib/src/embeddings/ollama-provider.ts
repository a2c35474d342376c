/**
 * Ollama Embedding Provider
 *
 * Calls `POST /api/embed` on a local Ollama server.
 */

import { z } from 'zod';

import { createHttpClient } from '../http/index.js';
import type { HttpClient } from '../http/types.js';
import type { Logger } from '../logging/logger.js';
import { HttpEmbeddingProvider } from './provider.js';
import {
  EmbeddingError,
  EmbeddingErrorCode,
  OllamaEmbeddingConfigSchema,
  resolveModelDimensions,
  type OllamaEmbeddingConfigInput,
} from './types.js';

const OllamaEmbedResponseSchema = z.object({
  embeddings: z.array(z.array(z.number())),
});

export interface OllamaProviderDeps {
  http?: HttpClient;
  logger?: Logger;
}

export class OllamaEmbeddingProvider extends HttpEmbeddingProvider {
  override readonly name = 'ollama';

  constructor(config: OllamaEmbeddingConfigInput = {}, deps: OllamaProviderDeps = {}) {
    const parsed = OllamaEmbeddingConfigSchema.parse(config);
    super(
      {
        model: parsed.model,
        dimensions: resolveModelDimensions(parsed.model, parsed.dimensions),
        batchSize: parsed.batchSize,
        retry: parsed.retry,
        http: deps.http ?? createHttpClient({ baseURL: parsed.host, timeout: parsed.timeout }),
        logger: deps.logger,
      },
      'embeddings:ollama'
    );
  }

  protected override async requestBatch(texts: string[], signal?: AbortSignal): Promise<number[][]> {
    const response = await this.http.post(
      '/api/embed',
      { model: this.model, input: texts },
      signal ? { signal } : {}
    );

    const parsed = OllamaEmbedResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new EmbeddingError(
        `Unexpected Ollama response: ${parsed.error.issues[0]?.message ?? 'invalid body'}`,
        EmbeddingErrorCode.INVALID_RESPONSE
      );
    }
    return parsed.data.embeddings;
  }
}
