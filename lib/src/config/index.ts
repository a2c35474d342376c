/**
 * Configuration Module
 *
 * @example
 * ```typescript
 * import { loadAppConfig, createDefaultPipelineConfig } from '@techdoc-rag/lib';
 *
 * const app = loadAppConfig();            // reads process.env
 * app.pipeline.chunking.chunkSize;        // 500 unless CHUNK_SIZE is set
 *
 * const tuned = createDefaultPipelineConfig({
 *   chunking: { tocMinChars: 80 },
 *   search: { boosts: { title: 0.3 } },
 * });
 * ```
 */

export {
  ConfigError,
  ConfigErrorCode,
  isConfigError,
  DEFAULT_HEADER_PATTERNS,
  ChunkingConfigSchema,
  type ChunkingConfig,
  BoostTiersSchema,
  type BoostTiers,
  SearchConfigSchema,
  type SearchConfig,
  PipelineConfigSchema,
  type PipelineConfig,
  type PipelineConfigInput,
  createDefaultChunkingConfig,
  createDefaultSearchConfig,
  createDefaultPipelineConfig,
} from './types.js';

export {
  EmbeddingProviderName,
  EnvSchema,
  type EnvValues,
  type AppConfig,
  loadAppConfig,
  requireValue,
} from './env.js';
