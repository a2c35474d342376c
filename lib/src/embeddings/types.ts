/**
 * Embedding Types and Schemas
 *
 * Provider contract, provider configuration and errors for the services that
 * turn chunk text and queries into vectors.
 */

import { z } from 'zod';

import { describeHttpFailure } from '../http/errors.js';
import { RetryConfigSchema } from '../http/types.js';

// =============================================================================
// Models
// =============================================================================

/**
 * Output dimensions of well-known embedding models
 */
export const MODEL_DIMENSIONS: Readonly<Record<string, number>> = {
  'text-embedding-3-small': 1536,
  'text-embedding-3-large': 3072,
  'text-embedding-ada-002': 1536,
  'nomic-embed-text': 768,
  'mxbai-embed-large': 1024,
  'all-minilm': 384,
};

export function getModelDimensions(model: string): number | undefined {
  return MODEL_DIMENSIONS[model];
}

// =============================================================================
// Provider Contract
// =============================================================================

export interface EmbedOptions {
  signal?: AbortSignal;
}

/**
 * A service that embeds text. Implementations batch internally; callers may
 * pass any number of texts.
 */
export interface EmbeddingProvider {
  /** Provider name, e.g. `openai` */
  readonly name: string;
  readonly model: string;
  /** Vector length this provider produces */
  readonly dimensions: number;
  embedDocuments(texts: string[], options?: EmbedOptions): Promise<number[][]>;
  embedQuery(text: string, options?: EmbedOptions): Promise<number[]>;
}

// =============================================================================
// Provider Configuration
// =============================================================================

export const OpenAIEmbeddingConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default('https://api.openai.com/v1'),
  model: z.string().min(1).default('text-embedding-3-small'),
  /** Required for models missing from MODEL_DIMENSIONS */
  dimensions: z.number().int().positive().optional(),
  /** Inputs per request; the API accepts up to 2048 */
  batchSize: z.number().int().positive().max(2048).default(100),
  timeout: z.number().int().positive().default(60000),
  retry: RetryConfigSchema.default({}),
});

export type OpenAIEmbeddingConfig = z.infer<typeof OpenAIEmbeddingConfigSchema>;

export type OpenAIEmbeddingConfigInput = z.input<typeof OpenAIEmbeddingConfigSchema>;

export const OllamaEmbeddingConfigSchema = z.object({
  host: z.string().url().default('http://localhost:11434'),
  model: z.string().min(1).default('nomic-embed-text'),
  dimensions: z.number().int().positive().optional(),
  batchSize: z.number().int().positive().default(32),
  timeout: z.number().int().positive().default(120000),
  retry: RetryConfigSchema.default({ maxRetries: 1 }),
});

export type OllamaEmbeddingConfig = z.infer<typeof OllamaEmbeddingConfigSchema>;

export type OllamaEmbeddingConfigInput = z.input<typeof OllamaEmbeddingConfigSchema>;

// =============================================================================
// Error Types
// =============================================================================

export const EmbeddingErrorCode = {
  /** API key rejected */
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  /** Rate limit still exceeded after retries */
  RATE_LIMITED: 'RATE_LIMITED',
  TIMEOUT: 'TIMEOUT',
  /** Service unreachable */
  NETWORK_ERROR: 'NETWORK_ERROR',
  /** Non-success response from the service */
  API_ERROR: 'API_ERROR',
  /** Response body did not have the expected shape */
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  /** Vector length differs from the expected dimension */
  DIMENSION_MISMATCH: 'DIMENSION_MISMATCH',
  /** Model has no known dimension and none was configured */
  UNKNOWN_MODEL: 'UNKNOWN_MODEL',
  ABORTED: 'ABORTED',
  UNKNOWN: 'UNKNOWN',
} as const;

export type EmbeddingErrorCode = (typeof EmbeddingErrorCode)[keyof typeof EmbeddingErrorCode];

export const EmbeddingErrorCodeSchema = z.enum([
  'AUTHENTICATION_ERROR',
  'RATE_LIMITED',
  'TIMEOUT',
  'NETWORK_ERROR',
  'API_ERROR',
  'INVALID_RESPONSE',
  'DIMENSION_MISMATCH',
  'UNKNOWN_MODEL',
  'ABORTED',
  'UNKNOWN',
]);

/**
 * Custom error class for embedding failures
 */
export class EmbeddingError extends Error {
  readonly code: EmbeddingErrorCode;
  override readonly cause: Error | undefined;
  /** HTTP status of the failed response, when there was one */
  readonly status: number | undefined;

  constructor(
    message: string,
    code: EmbeddingErrorCode,
    options?: { cause?: Error; status?: number }
  ) {
    super(message);
    this.name = 'EmbeddingError';
    this.code = code;
    this.cause = options?.cause;
    this.status = options?.status;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, EmbeddingError);
    }
  }

  /**
   * Wrap an unknown error, classifying HTTP failures by status
   */
  static fromError(error: unknown, context?: string): EmbeddingError {
    if (error instanceof EmbeddingError) {
      return error;
    }

    const failure = describeHttpFailure(error);
    const cause = error instanceof Error ? error : undefined;
    const message = context ? `${context}: ${failure.message}` : failure.message;

    return new EmbeddingError(message, failure.code, {
      ...(cause ? { cause } : {}),
      ...(failure.status !== undefined ? { status: failure.status } : {}),
    });
  }
}

export function isEmbeddingError(error: unknown): error is EmbeddingError {
  return error instanceof EmbeddingError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Dimension for a model, from configuration or the known-model table
 *
 * @throws {EmbeddingError} UNKNOWN_MODEL when neither is available
 */
export function resolveModelDimensions(model: string, configured?: number): number {
  const dimensions = configured ?? getModelDimensions(model);
  if (dimensions === undefined) {
    throw new EmbeddingError(
      `Unknown dimensions for embedding model '${model}'; set them explicitly`,
      EmbeddingErrorCode.UNKNOWN_MODEL
    );
  }
  return dimensions;
}

/**
 * Calculate cosine similarity between two vectors
 */
export function cosineSimilarity(a: readonly number[], b: readonly number[]): number {
  if (a.length !== b.length) {
    throw new EmbeddingError(
      `Vector dimension mismatch: ${a.length} vs ${b.length}`,
      EmbeddingErrorCode.DIMENSION_MISMATCH
    );
  }

  let dotProduct = 0;
  let normA = 0;
  let normB = 0;

  for (let i = 0; i < a.length; i++) {
    dotProduct += a[i]! * b[i]!;
    normA += a[i]! * a[i]!;
    normB += b[i]! * b[i]!;
  }

  const magnitude = Math.sqrt(normA) * Math.sqrt(normB);
  if (magnitude === 0) {
    return 0;
  }

  return dotProduct / magnitude;
}

/**
 * Normalize a vector to unit length (L2 normalization)
 */
export function normalizeVector(vector: readonly number[]): number[] {
  const magnitude = Math.sqrt(vector.reduce((sum, val) => sum + val * val, 0));
  if (magnitude === 0) {
    return [...vector];
  }
  return vector.map((val) => val / magnitude);
}
