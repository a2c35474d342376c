/**
 * Embeddings Module
 *
 * Providers that turn chunk text and queries into vectors.
 *
 * @example
 * ```typescript
 * import { createEmbeddingProvider, loadAppConfig } from '@techdoc-rag/lib';
 *
 * const config = loadAppConfig();
 * const provider = createEmbeddingProvider(config.embedding);
 *
 * const vectors = await provider.embedDocuments(chunks.map((c) => c.text));
 * const query = await provider.embedQuery('AFIO_MAPR reset value');
 * ```
 */

export {
  MODEL_DIMENSIONS,
  getModelDimensions,
  type EmbedOptions,
  type EmbeddingProvider,
  OpenAIEmbeddingConfigSchema,
  type OpenAIEmbeddingConfig,
  type OpenAIEmbeddingConfigInput,
  OllamaEmbeddingConfigSchema,
  type OllamaEmbeddingConfig,
  type OllamaEmbeddingConfigInput,
  EmbeddingErrorCode,
  EmbeddingErrorCodeSchema,
  EmbeddingError,
  isEmbeddingError,
  resolveModelDimensions,
  cosineSimilarity,
  normalizeVector,
} from './types.js';

export {
  EmbeddingVectorSchema,
  DimensionValidationResultSchema,
  type DimensionValidationResult,
  checkEmbeddingDimensions,
  validateEmbeddingDimensions,
  areDimensionsConsistent,
} from './dimension-validation.js';

export { HttpEmbeddingProvider, type BaseProviderSettings } from './provider.js';
export { OpenAIEmbeddingProvider, type OpenAIProviderDeps } from './openai-provider.js';
export { OllamaEmbeddingProvider, type OllamaProviderDeps } from './ollama-provider.js';
export { createEmbeddingProvider } from './factory.js';
