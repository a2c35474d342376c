/**
 * Retry Utilities for HTTP Collaborators
 *
 * Exponential backoff with jitter for rate limits, timeouts, network
 * failures and 5xx responses.
 */

import type { Logger } from '../logging/logger.js';
import { describeHttpFailure } from './errors.js';
import { RetryConfigSchema, type RetryConfig, type RetryConfigInput } from './types.js';

// ============================================================================
// Retry Utilities
// ============================================================================

/**
 * Delay before the next attempt. A server-provided Retry-After wins, capped
 * at `maxDelayMs`.
 *
 * @param attemptNumber - The attempt that just failed (1-based)
 */
export function calculateRetryDelay(
  attemptNumber: number,
  config: RetryConfig,
  retryAfterMs?: number
): number {
  if (retryAfterMs !== undefined && retryAfterMs > 0) {
    return Math.min(retryAfterMs, config.maxDelayMs);
  }

  const exponentialDelay =
    config.initialDelayMs * Math.pow(config.backoffMultiplier, attemptNumber - 1);
  let delay = Math.min(exponentialDelay, config.maxDelayMs);

  if (config.jitter) {
    const jitterRange = delay * config.jitterFactor;
    delay += (Math.random() - 0.5) * jitterRange;
    delay = Math.max(0, delay);
  }

  return Math.round(delay);
}

/**
 * Sleep that rejects as soon as `signal` aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    signal?.throwIfAborted();
    const onAbort = (): void => {
      clearTimeout(timer);
      reject(signal?.reason);
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function mergeRetryConfig(config?: RetryConfigInput): RetryConfig {
  return RetryConfigSchema.parse(config ?? {});
}

// ============================================================================
// withRetry Function
// ============================================================================

export interface WithRetryOptions {
  config?: RetryConfigInput;
  signal?: AbortSignal;
  logger?: Logger;
  /** Label used in retry log lines, e.g. `openai embeddings` */
  operation?: string;
}

/**
 * Run `fn`, retrying failures that describeHttpFailure() marks retryable.
 * The last error is rethrown unchanged.
 *
 * @example
 * ```typescript
 * const response = await withRetry(
 *   () => http.post('/embeddings', body, { signal }),
 *   { config: { maxRetries: 5 }, signal, logger, operation: 'openai embeddings' }
 * );
 * ```
 */
export async function withRetry<T>(fn: () => Promise<T>, options: WithRetryOptions = {}): Promise<T> {
  const config = mergeRetryConfig(options.config);
  const { signal, logger } = options;

  for (let attempt = 1; ; attempt++) {
    signal?.throwIfAborted();
    try {
      return await fn();
    } catch (error) {
      const failure = describeHttpFailure(error);
      if (!failure.retryable || attempt > config.maxRetries) {
        throw error;
      }

      const delayMs = calculateRetryDelay(attempt, config, failure.retryAfterMs);
      logger?.warn(`${options.operation ?? 'Request'} failed, retrying`, {
        attempt,
        maxRetries: config.maxRetries,
        code: failure.code,
        delayMs,
      });
      await sleep(delayMs, signal);
    }
  }
}
