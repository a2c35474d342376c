/**
 * Maps axios failures onto HttpFailure codes.
 */

import axios from 'axios';

import { HttpFailureCode, type HttpFailure } from './types.js';

const TIMEOUT_CODES = new Set(['ECONNABORTED', 'ETIMEDOUT']);

function parseRetryAfter(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return value * 1000;
  }
  if (typeof value === 'string' && value.trim() !== '') {
    const seconds = Number(value);
    if (Number.isFinite(seconds)) {
      return seconds * 1000;
    }
    const date = Date.parse(value);
    if (!Number.isNaN(date)) {
      return Math.max(0, date - Date.now());
    }
  }
  return undefined;
}

/**
 * Best-effort error text from a JSON error body
 * (`{error: {message}}`, `{message}`, `{error}` or a plain string)
 */
export function extractErrorMessage(body: unknown): string | undefined {
  if (typeof body === 'string') {
    return body || undefined;
  }
  if (body === null || typeof body !== 'object') {
    return undefined;
  }
  const error: unknown = Reflect.get(body, 'error');
  if (typeof error === 'string') {
    return error;
  }
  if (error !== null && typeof error === 'object') {
    const nested: unknown = Reflect.get(error, 'message');
    if (typeof nested === 'string') {
      return nested;
    }
  }
  const message: unknown = Reflect.get(body, 'message');
  return typeof message === 'string' ? message : undefined;
}

function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

/**
 * Classify any error thrown by an HTTP call
 */
export function describeHttpFailure(error: unknown): HttpFailure {
  if (axios.isCancel(error) || isAbortError(error)) {
    return { code: HttpFailureCode.ABORTED, message: 'Request aborted', retryable: false };
  }

  if (!axios.isAxiosError(error)) {
    const message = error instanceof Error ? error.message : String(error);
    return { code: HttpFailureCode.API_ERROR, message, retryable: false };
  }

  if (error.code && TIMEOUT_CODES.has(error.code)) {
    return { code: HttpFailureCode.TIMEOUT, message: error.message, retryable: true };
  }

  const response = error.response;
  if (!response) {
    return { code: HttpFailureCode.NETWORK_ERROR, message: error.message, retryable: true };
  }

  const status = response.status;
  const detail = extractErrorMessage(response.data);
  const message = detail ? `HTTP ${status}: ${detail}` : `HTTP ${status}: ${error.message}`;

  if (status === 401 || status === 403) {
    return { code: HttpFailureCode.AUTHENTICATION_ERROR, message, status, retryable: false };
  }
  if (status === 429) {
    const retryAfterMs = parseRetryAfter(response.headers['retry-after']);
    return {
      code: HttpFailureCode.RATE_LIMITED,
      message,
      status,
      retryable: true,
      ...(retryAfterMs !== undefined ? { retryAfterMs } : {}),
    };
  }
  if (status === 408) {
    return { code: HttpFailureCode.TIMEOUT, message, status, retryable: true };
  }
  return { code: HttpFailureCode.API_ERROR, message, status, retryable: status >= 500 };
}
