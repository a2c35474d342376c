/**
 * HTTP Collaborator Types
 *
 * Shared shapes for the embedding and rerank services reached over HTTP.
 */

import type { AxiosRequestConfig } from 'axios';
import { z } from 'zod';

// =============================================================================
// Failure Classification
// =============================================================================

export const HttpFailureCode = {
  /** 401 / 403 */
  AUTHENTICATION_ERROR: 'AUTHENTICATION_ERROR',
  /** 429 */
  RATE_LIMITED: 'RATE_LIMITED',
  /** Request exceeded its timeout */
  TIMEOUT: 'TIMEOUT',
  /** No response (refused, reset, DNS) */
  NETWORK_ERROR: 'NETWORK_ERROR',
  /** Cancelled through an AbortSignal */
  ABORTED: 'ABORTED',
  /** Any other non-2xx response */
  API_ERROR: 'API_ERROR',
} as const;

export type HttpFailureCode = (typeof HttpFailureCode)[keyof typeof HttpFailureCode];

export const HttpFailureCodeSchema = z.enum([
  'AUTHENTICATION_ERROR',
  'RATE_LIMITED',
  'TIMEOUT',
  'NETWORK_ERROR',
  'ABORTED',
  'API_ERROR',
]);

export interface HttpFailure {
  code: HttpFailureCode;
  message: string;
  status?: number;
  /** Whether repeating the request may succeed */
  retryable: boolean;
  /** Server-provided wait from a Retry-After header */
  retryAfterMs?: number;
}

// =============================================================================
// Retry Configuration
// =============================================================================

export const RetryConfigSchema = z.object({
  /** Attempts after the first one */
  maxRetries: z.number().int().nonnegative().default(3),
  initialDelayMs: z.number().int().nonnegative().default(1000),
  maxDelayMs: z.number().int().nonnegative().default(30000),
  backoffMultiplier: z.number().min(1).default(2),
  /** Randomize delays to avoid synchronized retries */
  jitter: z.boolean().default(true),
  jitterFactor: z.number().min(0).max(1).default(0.1),
});

export type RetryConfig = z.infer<typeof RetryConfigSchema>;

export type RetryConfigInput = z.input<typeof RetryConfigSchema>;

// =============================================================================
// Client
// =============================================================================

/**
 * The part of an axios instance the collaborators use. `axios.create()`
 * satisfies it; tests pass an object with a mocked `post`.
 */
export interface HttpClient {
  post(url: string, data: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}
