/**
 * Tests for the HTTP embedding providers
 */

import { describe, it, expect } from 'vitest';

import {
  OpenAIEmbeddingProvider,
  OllamaEmbeddingProvider,
  createEmbeddingProvider,
  EmbeddingError,
  EmbeddingErrorCode,
} from '../../lib/src/embeddings/index.js';
import { ConfigError } from '../../lib/src/config/index.js';
import { captureLogger, httpError, mockHttp, FAST_RETRY, NO_RETRY } from '../helpers/index.js';

function openai(options: { batchSize?: number; retry?: typeof FAST_RETRY | typeof NO_RETRY } = {}) {
  const { http, post } = mockHttp();
  const { logger, lines } = captureLogger();
  const provider = new OpenAIEmbeddingProvider(
    {
      apiKey: 'test-secret',
      model: 'test-model',
      dimensions: 3,
      batchSize: options.batchSize ?? 100,
      retry: options.retry ?? NO_RETRY,
    },
    { http, logger }
  );
  return { provider, post, lines };
}

describe('OpenAIEmbeddingProvider', () => {
  it('should return vectors in input order using the response index', async () => {
    const { provider, post } = openai();
    post.mockResolvedValueOnce({
      data: {
        data: [
          { index: 1, embedding: [0, 1, 0] },
          { index: 0, embedding: [1, 0, 0] },
        ],
      },
    });

    const vectors = await provider.embedDocuments(['a', 'b']);

    expect(vectors).toEqual([
      [1, 0, 0],
      [0, 1, 0],
    ]);
    expect(post).toHaveBeenCalledWith(
      '/embeddings',
      { model: 'test-model', input: ['a', 'b'], encoding_format: 'float' },
      {}
    );
  });

  it('should split input into batches', async () => {
    const { provider, post } = openai({ batchSize: 2 });
    post
      .mockResolvedValueOnce({
        data: {
          data: [
            { index: 0, embedding: [1, 0, 0] },
            { index: 1, embedding: [0, 1, 0] },
          ],
        },
      })
      .mockResolvedValueOnce({ data: { data: [{ index: 0, embedding: [0, 0, 1] }] } });

    const vectors = await provider.embedDocuments(['a', 'b', 'c']);

    expect(vectors).toHaveLength(3);
    expect(post).toHaveBeenCalledTimes(2);
    expect(post.mock.calls[1]?.[1]).toEqual({
      model: 'test-model',
      input: ['c'],
      encoding_format: 'float',
    });
  });

  it('should not call the service for empty input', async () => {
    const { provider, post } = openai();

    await expect(provider.embedDocuments([])).resolves.toEqual([]);
    expect(post).not.toHaveBeenCalled();
  });

  it('should retry a rate-limited request', async () => {
    const { provider, post, lines } = openai({ retry: FAST_RETRY });
    post
      .mockRejectedValueOnce(httpError(429, { error: { message: 'slow down' } }, { 'retry-after': '0' }))
      .mockResolvedValueOnce({ data: { data: [{ index: 0, embedding: [1, 0, 0] }] } });

    const vector = await provider.embedQuery('AFIO_MAPR');

    expect(vector).toEqual([1, 0, 0]);
    expect(post).toHaveBeenCalledTimes(2);
    expect(lines[0]).toContain('openai embeddings failed, retrying');
  });

  it('should map a rejected key to AUTHENTICATION_ERROR without retrying', async () => {
    const { provider, post } = openai({ retry: FAST_RETRY });
    post.mockRejectedValueOnce(httpError(401, { error: { message: 'Incorrect API key' } }));

    const error = await provider.embedQuery('x').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(EmbeddingError);
    expect(error).toMatchObject({
      code: EmbeddingErrorCode.AUTHENTICATION_ERROR,
      status: 401,
      message: 'openai embedding request failed: HTTP 401: Incorrect API key',
    });
    expect(post).toHaveBeenCalledTimes(1);
  });

  it('should reject vectors of the wrong length', async () => {
    const { provider, post } = openai();
    post.mockResolvedValueOnce({ data: { data: [{ index: 0, embedding: [1, 0] }] } });

    await expect(provider.embedDocuments(['a'])).rejects.toMatchObject({
      code: EmbeddingErrorCode.DIMENSION_MISMATCH,
      message: 'Embedding at index 0: Dimension mismatch: expected 3, got 2',
    });
  });

  it('should reject a malformed body', async () => {
    const { provider, post } = openai();
    post.mockResolvedValueOnce({ data: { object: 'list' } });

    await expect(provider.embedQuery('a')).rejects.toMatchObject({
      code: EmbeddingErrorCode.INVALID_RESPONSE,
    });
  });

  it('should stop before calling the service when already aborted', async () => {
    const { provider, post } = openai();
    const controller = new AbortController();
    controller.abort();

    await expect(
      provider.embedDocuments(['a'], { signal: controller.signal })
    ).rejects.toMatchObject({ code: EmbeddingErrorCode.ABORTED });
    expect(post).not.toHaveBeenCalled();
  });

  it('should refuse a model with unknown dimensions', () => {
    expect(() => new OpenAIEmbeddingProvider({ apiKey: 'test-secret', model: 'custom' })).toThrow(
      expect.objectContaining({ code: EmbeddingErrorCode.UNKNOWN_MODEL })
    );
  });
});

describe('OllamaEmbeddingProvider', () => {
  it('should post to /api/embed and return embeddings', async () => {
    const { http, post } = mockHttp();
    const provider = new OllamaEmbeddingProvider({ dimensions: 2, retry: NO_RETRY }, { http });
    post.mockResolvedValueOnce({ data: { embeddings: [[0.5, 0.5]] } });

    const vector = await provider.embedQuery('TIM1_CCR2');

    expect(vector).toEqual([0.5, 0.5]);
    expect(post).toHaveBeenCalledWith(
      '/api/embed',
      { model: 'nomic-embed-text', input: ['TIM1_CCR2'] },
      {}
    );
  });
});

describe('createEmbeddingProvider', () => {
  const base = {
    openai: { baseUrl: 'https://api.openai.com/v1', model: 'text-embedding-3-small' },
    ollama: { host: 'http://localhost:11434', model: 'nomic-embed-text' },
  };

  it('should require an OpenAI key', () => {
    expect(() => createEmbeddingProvider({ ...base, provider: 'openai' })).toThrow(ConfigError);
  });

  it('should build the selected provider', () => {
    const provider = createEmbeddingProvider({ ...base, provider: 'ollama' });

    expect(provider.name).toBe('ollama');
    expect(provider.dimensions).toBe(768);
  });

  it('should resolve OpenAI dimensions from the model table', () => {
    const provider = createEmbeddingProvider({
      ...base,
      provider: 'openai',
      openai: { ...base.openai, apiKey: 'test-secret' },
    });

    expect(provider.dimensions).toBe(1536);
  });
});
