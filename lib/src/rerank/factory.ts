/**
 * Reranker Factory
 */

import type { AppConfig } from '../config/env.js';
import { requireValue } from '../config/env.js';
import type { Logger } from '../logging/logger.js';
import { CohereReranker } from './cohere.js';
import { CrossEncoderReranker } from './cross-encoder.js';
import { RerankBackend, type Reranker } from './types.js';

/**
 * @throws {ConfigError} when the Cohere backend is selected without a key
 */
export function createReranker(
  backend: RerankBackend,
  config: AppConfig['rerank'],
  logger?: Logger
): Reranker {
  const deps = logger ? { logger } : {};

  switch (backend) {
    case RerankBackend.COHERE:
      return new CohereReranker({ apiKey: requireValue(config.cohereApiKey, 'COHERE_API_KEY') }, deps);
    case RerankBackend.LOCAL:
      return new CrossEncoderReranker({ backend, url: config.localUrl }, deps);
    case RerankBackend.BGE:
      return new CrossEncoderReranker({ backend, url: config.bgeUrl }, deps);
  }
}
