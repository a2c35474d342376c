/**
 * Rerank Module
 *
 * @example
 * ```typescript
 * import { createReranker, loadAppConfig } from '@techdoc-rag/lib';
 *
 * const reranker = createReranker('local', loadAppConfig().rerank);
 * const scores = await reranker.score('AFIO_MAPR reset value', candidateTexts);
 * ```
 */

export {
  RerankBackend,
  RerankBackendSchema,
  CROSS_ENCODER_MODELS,
  type RerankOptions,
  type Reranker,
  CohereRerankConfigSchema,
  type CohereRerankConfig,
  type CohereRerankConfigInput,
  CrossEncoderConfigSchema,
  type CrossEncoderConfig,
  type CrossEncoderConfigInput,
  RerankErrorCode,
  RerankErrorCodeSchema,
  RerankError,
  isRerankError,
  scoresByIndex,
} from './types.js';

export { CohereReranker } from './cohere.js';
export { CrossEncoderReranker } from './cross-encoder.js';
export { createReranker } from './factory.js';
