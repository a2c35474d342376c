/**
 * Environment Configuration
 *
 * Reads the process environment into a validated, frozen application
 * configuration: pipeline tuning plus collaborator endpoints and keys.
 */

import { z } from 'zod';

import {
  ConfigError,
  ConfigErrorCode,
  createDefaultPipelineConfig,
  type PipelineConfig,
} from './types.js';
import { loadLoggerConfigFromEnv, type LoggerConfig } from '../logging/types.js';

// =============================================================================
// Schema
// =============================================================================

export const EmbeddingProviderName = {
  OPENAI: 'openai',
  OLLAMA: 'ollama',
} as const;

export type EmbeddingProviderName =
  (typeof EmbeddingProviderName)[keyof typeof EmbeddingProviderName];

const intFromEnv = z.coerce.number().int();
const numberFromEnv = z.coerce.number();
const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim().length > 0 ? v.trim() : undefined));

export const EnvSchema = z.object({
  CHUNK_SIZE: intFromEnv.positive().optional(),
  CHUNK_OVERLAP: intFromEnv.nonnegative().optional(),
  TOP_K_RESULTS: intFromEnv.positive().optional(),
  CANDIDATE_EXPANSION_FACTOR: intFromEnv.positive().optional(),
  TOC_MIN_CHARS: intFromEnv.nonnegative().optional(),
  OVERVIEW_MIN_IDENTIFIERS: intFromEnv.positive().optional(),
  BOOST_TITLE: numberFromEnv.nonnegative().optional(),
  BOOST_KEY_TERMS: numberFromEnv.nonnegative().optional(),
  BOOST_BODY: numberFromEnv.nonnegative().optional(),

  EMBEDDING_PROVIDER: z.enum(['openai', 'ollama']).default('openai'),
  OPENAI_API_KEY: optionalString,
  OPENAI_BASE_URL: z.string().url().default('https://api.openai.com/v1'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),
  OLLAMA_HOST: z.string().url().default('http://localhost:11434'),
  OLLAMA_EMBEDDING_MODEL: z.string().default('nomic-embed-text'),

  QDRANT_URL: z.string().url().default('http://localhost:6333'),
  QDRANT_API_KEY: optionalString,
  QDRANT_TIMEOUT_MS: intFromEnv.positive().default(30000),

  COHERE_API_KEY: optionalString,
  RERANK_LOCAL_URL: z.string().url().default('http://localhost:8081'),
  RERANK_BGE_URL: z.string().url().default('http://localhost:8082'),
});

export type EnvValues = z.infer<typeof EnvSchema>;

export interface AppConfig {
  pipeline: Readonly<PipelineConfig>;
  embedding: {
    provider: EmbeddingProviderName;
    openai: { apiKey?: string; baseUrl: string; model: string };
    ollama: { host: string; model: string };
  };
  qdrant: { url: string; apiKey?: string; timeout: number };
  rerank: {
    cohereApiKey?: string;
    localUrl: string;
    bgeUrl: string;
  };
  logging: Partial<LoggerConfig>;
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Blank values are treated as unset so `.env` templates with empty keys parse.
 */
function withoutBlanks(env: NodeJS.ProcessEnv): Record<string, string> {
  const result: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== '') {
      result[key] = value;
    }
  }
  return result;
}

/**
 * Load the application configuration from environment variables.
 *
 * @throws {ConfigError} listing every invalid variable
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): Readonly<AppConfig> {
  const parsed = EnvSchema.safeParse(withoutBlanks(env));
  if (!parsed.success) {
    const fields = [...new Set(parsed.error.issues.map((issue) => issue.path.join('.')))];
    throw new ConfigError(
      `Invalid environment configuration: ${fields.join(', ')}`,
      ConfigErrorCode.INVALID_VALUE,
      fields
    );
  }
  const values = parsed.data;

  let pipeline: Readonly<PipelineConfig>;
  try {
    pipeline = createDefaultPipelineConfig({
      chunking: {
        chunkSize: values.CHUNK_SIZE,
        chunkOverlap: values.CHUNK_OVERLAP,
        tocMinChars: values.TOC_MIN_CHARS,
        overviewMinIdentifiers: values.OVERVIEW_MIN_IDENTIFIERS,
      },
      search: {
        topK: values.TOP_K_RESULTS,
        candidateExpansionFactor: values.CANDIDATE_EXPANSION_FACTOR,
        boosts: {
          title: values.BOOST_TITLE,
          keyTerms: values.BOOST_KEY_TERMS,
          body: values.BOOST_BODY,
        },
      },
    });
  } catch (error) {
    if (error instanceof z.ZodError) {
      throw new ConfigError(
        `Invalid pipeline configuration: ${error.issues.map((i) => i.message).join('; ')}`,
        ConfigErrorCode.INVALID_VALUE,
        error.issues.map((i) => i.path.join('.'))
      );
    }
    throw error;
  }

  return Object.freeze({
    pipeline,
    embedding: {
      provider: values.EMBEDDING_PROVIDER,
      openai: {
        apiKey: values.OPENAI_API_KEY,
        baseUrl: values.OPENAI_BASE_URL,
        model: values.OPENAI_EMBEDDING_MODEL,
      },
      ollama: { host: values.OLLAMA_HOST, model: values.OLLAMA_EMBEDDING_MODEL },
    },
    qdrant: {
      url: values.QDRANT_URL,
      apiKey: values.QDRANT_API_KEY,
      timeout: values.QDRANT_TIMEOUT_MS,
    },
    rerank: {
      cohereApiKey: values.COHERE_API_KEY,
      localUrl: values.RERANK_LOCAL_URL,
      bgeUrl: values.RERANK_BGE_URL,
    },
    logging: loadLoggerConfigFromEnv(env),
  });
}

/**
 * Throw when a required secret is absent
 */
export function requireValue(value: string | undefined, name: string): string {
  if (!value) {
    throw new ConfigError(`${name} is not set`, ConfigErrorCode.MISSING_VALUE, [name]);
  }
  return value;
}
