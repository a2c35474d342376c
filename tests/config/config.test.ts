/**
 * Tests for pipeline and environment configuration
 */

import { describe, it, expect } from 'vitest';
import {
  ConfigError,
  ConfigErrorCode,
  createDefaultChunkingConfig,
  createDefaultPipelineConfig,
  createDefaultSearchConfig,
  isConfigError,
  loadAppConfig,
  requireValue,
} from '../../lib/src/config/index.js';
import { LogLevel } from '../../lib/src/logging/index.js';

describe('createDefaultChunkingConfig', () => {
  it('should apply defaults', () => {
    const config = createDefaultChunkingConfig();

    expect(config.chunkSize).toBe(500);
    expect(config.chunkOverlap).toBe(50);
    expect(config.tocMinChars).toBe(50);
    expect(config.overviewMinIdentifiers).toBe(4);
    expect(config.headerPatterns).toHaveLength(3);
  });

  it('should reject an overlap as large as the chunk', () => {
    expect(() => createDefaultChunkingConfig({ chunkSize: 100, chunkOverlap: 100 })).toThrow(
      'chunkOverlap must be smaller than chunkSize'
    );
  });

  it('should freeze the result deeply', () => {
    const config = createDefaultChunkingConfig();
    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.headerPatterns)).toBe(true);
  });
});

describe('createDefaultSearchConfig', () => {
  it('should default the boost tiers', () => {
    expect(createDefaultSearchConfig().boosts).toEqual({ title: 0.2, keyTerms: 0.1, body: 0.05 });
  });

  it('should merge partial boost overrides', () => {
    expect(createDefaultSearchConfig({ boosts: { title: 0.5 } }).boosts).toEqual({
      title: 0.5,
      keyTerms: 0.1,
      body: 0.05,
    });
  });
});

describe('createDefaultPipelineConfig', () => {
  it('should nest chunking and search defaults', () => {
    const config = createDefaultPipelineConfig();

    expect(config.chunking.chunkSize).toBe(500);
    expect(config.search.topK).toBe(5);
    expect(config.search.candidateExpansionFactor).toBe(5);
    expect(config.embeddingBatchSize).toBe(100);
  });
});

describe('loadAppConfig', () => {
  it('should use defaults for an empty environment', () => {
    const config = loadAppConfig({});

    expect(config.embedding.provider).toBe('openai');
    expect(config.embedding.openai.model).toBe('text-embedding-3-small');
    expect(config.embedding.openai.apiKey).toBeUndefined();
    expect(config.qdrant.url).toBe('http://localhost:6333');
    expect(config.qdrant.timeout).toBe(30000);
    expect(config.rerank.localUrl).toBe('http://localhost:8081');
    expect(config.pipeline.chunking.chunkSize).toBe(500);
  });

  it('should read tuning and collaborators from the environment', () => {
    const config = loadAppConfig({
      CHUNK_SIZE: '800',
      CHUNK_OVERLAP: '80',
      TOP_K_RESULTS: '3',
      BOOST_TITLE: '0.3',
      EMBEDDING_PROVIDER: 'ollama',
      OLLAMA_HOST: 'http://gpu-box:11434',
      QDRANT_API_KEY: 'test-secret',
      LOG_LEVEL: 'debug',
    });

    expect(config.pipeline.chunking.chunkSize).toBe(800);
    expect(config.pipeline.chunking.chunkOverlap).toBe(80);
    expect(config.pipeline.search.topK).toBe(3);
    expect(config.pipeline.search.boosts.title).toBe(0.3);
    expect(config.embedding.provider).toBe('ollama');
    expect(config.embedding.ollama.host).toBe('http://gpu-box:11434');
    expect(config.qdrant.apiKey).toBe('test-secret');
    expect(config.logging.level).toBe(LogLevel.DEBUG);
  });

  it('should treat blank values as unset', () => {
    const config = loadAppConfig({ OPENAI_API_KEY: '  ', CHUNK_SIZE: '' });

    expect(config.embedding.openai.apiKey).toBeUndefined();
    expect(config.pipeline.chunking.chunkSize).toBe(500);
  });

  it('should list every invalid variable', () => {
    try {
      loadAppConfig({ CHUNK_SIZE: 'big', EMBEDDING_PROVIDER: 'cohere' });
      expect.unreachable('loadAppConfig should throw');
    } catch (error) {
      expect(isConfigError(error)).toBe(true);
      if (!isConfigError(error)) return;
      expect(error.code).toBe(ConfigErrorCode.INVALID_VALUE);
      expect(error.fields).toEqual(['CHUNK_SIZE', 'EMBEDDING_PROVIDER']);
    }
  });

  it('should report cross-field pipeline violations', () => {
    expect(() => loadAppConfig({ CHUNK_SIZE: '100', CHUNK_OVERLAP: '200' })).toThrow(ConfigError);
  });
});

describe('requireValue', () => {
  it('should return present values', () => {
    expect(requireValue('test-secret', 'COHERE_API_KEY')).toBe('test-secret');
  });

  it('should throw a missing-value error naming the variable', () => {
    expect(() => requireValue(undefined, 'COHERE_API_KEY')).toThrow('COHERE_API_KEY is not set');
  });
});
