/**
 * Embedding Provider Factory
 */

import type { AppConfig } from '../config/env.js';
import { EmbeddingProviderName, requireValue } from '../config/env.js';
import type { Logger } from '../logging/logger.js';
import { OllamaEmbeddingProvider } from './ollama-provider.js';
import { OpenAIEmbeddingProvider } from './openai-provider.js';
import type { EmbeddingProvider } from './types.js';

/**
 * Build the provider selected by `EMBEDDING_PROVIDER`
 *
 * @throws {ConfigError} when the OpenAI provider is selected without a key
 */
export function createEmbeddingProvider(
  config: AppConfig['embedding'],
  logger?: Logger
): EmbeddingProvider {
  const deps = logger ? { logger } : {};

  switch (config.provider) {
    case EmbeddingProviderName.OPENAI:
      return new OpenAIEmbeddingProvider(
        {
          apiKey: requireValue(config.openai.apiKey, 'OPENAI_API_KEY'),
          baseUrl: config.openai.baseUrl,
          model: config.openai.model,
        },
        deps
      );
    case EmbeddingProviderName.OLLAMA:
      return new OllamaEmbeddingProvider(
        { host: config.ollama.host, model: config.ollama.model },
        deps
      );
  }
}
