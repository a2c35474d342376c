/**
 * HTTP Module
 *
 * axios client construction, failure classification and retry shared by
 * the embedding and rerank collaborators.
 */

import axios from 'axios';

import type { HttpClient } from './types.js';

export {
  HttpFailureCode,
  HttpFailureCodeSchema,
  RetryConfigSchema,
  type HttpFailure,
  type RetryConfig,
  type RetryConfigInput,
  type HttpClient,
} from './types.js';

export { describeHttpFailure, extractErrorMessage } from './errors.js';

export {
  calculateRetryDelay,
  sleep,
  mergeRetryConfig,
  withRetry,
  type WithRetryOptions,
} from './retry.js';

export interface HttpClientOptions {
  baseURL: string;
  timeout: number;
  headers?: Record<string, string>;
}

/**
 * JSON client for one collaborator endpoint
 */
export function createHttpClient(options: HttpClientOptions): HttpClient {
  return axios.create({
    baseURL: options.baseURL,
    timeout: options.timeout,
    headers: { 'Content-Type': 'application/json', ...options.headers },
  });
}
