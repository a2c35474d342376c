/**
 * Rerank Types
 *
 * Cross-encoder style rerankers that score (query, passage) pairs. Scores
 * replace vector similarity during search refinement.
 */

import { z } from 'zod';

import { describeHttpFailure } from '../http/errors.js';
import { RetryConfigSchema } from '../http/types.js';

// =============================================================================
// Backends
// =============================================================================

export const RerankBackend = {
  /** Cohere hosted rerank API */
  COHERE: 'cohere',
  /** ms-marco MiniLM cross-encoder behind a local inference server */
  LOCAL: 'local',
  /** BGE reranker behind a local inference server */
  BGE: 'bge',
} as const;

export type RerankBackend = (typeof RerankBackend)[keyof typeof RerankBackend];

export const RerankBackendSchema = z.enum(['cohere', 'local', 'bge']);

export const CROSS_ENCODER_MODELS: Readonly<Record<'local' | 'bge', string>> = {
  local: 'cross-encoder/ms-marco-MiniLM-L-12-v2',
  bge: 'BAAI/bge-reranker-v2-m3',
};

// =============================================================================
// Reranker Contract
// =============================================================================

export interface RerankOptions {
  signal?: AbortSignal;
}

export interface Reranker {
  readonly backend: RerankBackend;
  /**
   * Relevance of each text to the query, in input order
   */
  score(query: string, texts: string[], options?: RerankOptions): Promise<number[]>;
}

// =============================================================================
// Configuration
// =============================================================================

export const CohereRerankConfigSchema = z.object({
  apiKey: z.string().min(1),
  baseUrl: z.string().url().default('https://api.cohere.com'),
  model: z.string().min(1).default('rerank-v3.5'),
  timeout: z.number().int().positive().default(30000),
  retry: RetryConfigSchema.default({}),
});

export type CohereRerankConfig = z.infer<typeof CohereRerankConfigSchema>;

export type CohereRerankConfigInput = z.input<typeof CohereRerankConfigSchema>;

export const CrossEncoderConfigSchema = z.object({
  backend: z.enum(['local', 'bge']),
  /** Base URL of the inference server */
  url: z.string().url(),
  timeout: z.number().int().positive().default(60000),
  retry: RetryConfigSchema.default({ maxRetries: 1 }),
});

export type CrossEncoderConfig = z.infer<typeof CrossEncoderConfigSchema>;

export type CrossEncoderConfigInput = z.input<typeof CrossEncoderConfigSchema>;

// =============================================================================
// Error Types
// =============================================================================

export const RerankErrorCode = {
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  RATE_LIMITED: 'RATE_LIMITED',
  TIMEOUT: 'TIMEOUT',
  NETWORK_ERROR: 'NETWORK_ERROR',
  API_ERROR: 'API_ERROR',
  /** Missing, duplicate or out-of-range result indexes */
  INVALID_RESPONSE: 'INVALID_RESPONSE',
  ABORTED: 'ABORTED',
} as const;

export type RerankErrorCode = (typeof RerankErrorCode)[keyof typeof RerankErrorCode];

export const RerankErrorCodeSchema = z.enum([
  'AUTHENTICATION_ERROR',
  'RATE_LIMITED',
  'TIMEOUT',
  'NETWORK_ERROR',
  'API_ERROR',
  'INVALID_RESPONSE',
  'ABORTED',
]);

export class RerankError extends Error {
  readonly code: RerankErrorCode;
  override readonly cause: Error | undefined;
  readonly backend: RerankBackend;

  constructor(
    message: string,
    code: RerankErrorCode,
    backend: RerankBackend,
    options?: { cause?: Error }
  ) {
    super(message);
    this.name = 'RerankError';
    this.code = code;
    this.backend = backend;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, RerankError);
    }
  }

  static fromError(error: unknown, backend: RerankBackend): RerankError {
    if (error instanceof RerankError) {
      return error;
    }
    const failure = describeHttpFailure(error);
    const cause = error instanceof Error ? error : undefined;
    return new RerankError(
      `${backend} rerank failed: ${failure.message}`,
      failure.code,
      backend,
      cause ? { cause } : undefined
    );
  }
}

export function isRerankError(error: unknown): error is RerankError {
  return error instanceof RerankError;
}

// =============================================================================
// Utility Functions
// =============================================================================

/**
 * Place indexed results back in input order
 *
 * @throws {RerankError} INVALID_RESPONSE unless every input index appears exactly once
 */
export function scoresByIndex(
  results: ReadonlyArray<{ index: number; score: number }>,
  count: number,
  backend: RerankBackend
): number[] {
  const scores = new Array<number | undefined>(count).fill(undefined);
  for (const { index, score } of results) {
    if (index < 0 || index >= count || scores[index] !== undefined) {
      throw new RerankError(
        `Rerank response has an invalid index ${index}`,
        RerankErrorCode.INVALID_RESPONSE,
        backend
      );
    }
    scores[index] = score;
  }

  return scores.map((score, index) => {
    if (score === undefined) {
      throw new RerankError(
        `Rerank response is missing index ${index}`,
        RerankErrorCode.INVALID_RESPONSE,
        backend
      );
    }
    return score;
  });
}
