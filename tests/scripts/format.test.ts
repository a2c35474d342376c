/**
 * Tests for CLI output formatting
 */

import { describe, it, expect } from 'vitest';

import type { IngestResult, ProgressEntry, SearchResponse, SearchResult } from '../../lib/src/index.js';
import {
  formatDatabases,
  formatDocuments,
  formatEmbeddingProgress,
  formatFileProgress,
  formatIngestResult,
  formatLocation,
  formatSearchResponse,
  formatSearchResult,
} from '../../scripts/src/format.js';

function result(overrides: Partial<SearchResult> = {}): SearchResult {
  return {
    chunkId: 'rm0008_chunk_4',
    documentId: 'rm0008',
    text: 'AFIO_MAPR controls the remap.',
    source: 'rm0008.pdf',
    kind: 'register_definition',
    metadata: {},
    score: 0.81234,
    baseScore: 0.61234,
    keywordBoost: 0.2,
    matchedTerms: ['AFIO_MAPR'],
    originalRank: 2,
    rank: 1,
    snippet: 'AFIO_MAPR controls the remap.',
    ...overrides,
  };
}

describe('formatLocation', () => {
  it('should prefer the page and shorten long sections', () => {
    expect(formatLocation({ page: 180, section: 'AFIO' })).toBe('Page: 180');
    expect(formatLocation({ section: '9.4.2 AF remap and debug I/O configuration register' })).toBe(
      'Section: 9.4.2 AF remap and debug I/O c'
    );
    expect(formatLocation({})).toBe('');
  });
});

describe('formatSearchResult', () => {
  it('should print the score with two decimals and the quoted snippet', () => {
    expect(formatSearchResult(result({ page: 180 }))).toBe(
      '[1] Score: 0.81 | Source: rm0008.pdf | Page: 180\n    "AFIO_MAPR controls the remap."'
    );
  });

  it('should mark a truncated snippet', () => {
    const text = 'x'.repeat(250);

    expect(formatSearchResult(result({ text, snippet: 'x'.repeat(200) }))).toBe(
      `[1] Score: 0.81 | Source: rm0008.pdf\n    "${'x'.repeat(200)}..."`
    );
  });
});

describe('formatSearchResponse', () => {
  const response: SearchResponse = {
    query: 'AFIO_MAPR',
    results: [],
    fetchK: 25,
    candidateCount: 0,
    queryTerms: ['AFIO_MAPR'],
    stages: { rerank: 'degraded', keywordBoost: 'applied' },
    degradations: [
      { stage: 'rerank', backend: 'cohere', code: 'RATE_LIMITED', message: 'cohere rerank failed: HTTP 429' },
    ],
    durationMs: 41,
  };

  it('should warn about a degraded rerank and report no results', () => {
    expect(formatSearchResponse(response)).toEqual([
      'Warning: reranking disabled (cohere): cohere rerank failed: HTTP 429',
      'No results found.',
    ]);
  });

  it('should list results followed by the search time', () => {
    const lines = formatSearchResponse({ ...response, degradations: [], results: [result()] });

    expect(lines).toEqual([
      '',
      'Search results for: "AFIO_MAPR"',
      '',
      '[1] Score: 0.81 | Source: rm0008.pdf\n    "AFIO_MAPR controls the remap."',
      '',
      'Search time: 41ms',
    ]);
  });
});

describe('listings', () => {
  it('should format databases and documents', () => {
    expect(formatDatabases([])).toEqual(['No databases found.']);
    expect(formatDatabases([{ name: 'rm0008', pointCount: 12 }])).toEqual([
      'Available databases:',
      '  - rm0008 (12 chunks)',
    ]);
    expect(formatDocuments('rm0008', [{ documentId: 'rm0008', source: 'rm0008.pdf', chunkCount: 12 }])).toEqual([
      "Documents in 'rm0008':",
      '  - rm0008 (rm0008.pdf, 12 chunks)',
    ]);
  });

  it('should summarize an ingestion', () => {
    const ingested: IngestResult = {
      status: 'ingested',
      documentId: 'rm0008',
      source: 'rm0008.pdf',
      chunksWritten: 40,
      chunksReplaced: 38,
      sectionsDropped: 2,
      warnings: [],
      durationMs: 900,
    };

    expect(formatIngestResult('manuals', ingested)).toBe(
      "  Added 40 chunks to database 'manuals' as rm0008, replaced 38"
    );
    expect(formatIngestResult('manuals', { ...ingested, status: 'no_content', chunksWritten: 0 })).toBe(
      "  No text found in rm0008.pdf; nothing added to 'manuals'"
    );
  });
});

describe('progress', () => {
  it('should show the embedding batch and chunk counts', () => {
    expect(
      formatEmbeddingProgress({
        stage: 'embedding',
        documentId: 'rm0008',
        batch: 2,
        totalBatches: 3,
        chunksEmbedded: 200,
        totalChunks: 250,
      })
    ).toBe('  Embedding batch 2/3... (200/250 chunks)');
  });

  it('should summarize files done with the failures', () => {
    const entry: ProgressEntry = {
      current: 2,
      total: 4,
      percentage: 50,
      state: 'running',
      elapsedMs: 4000,
      estimatedRemainingMs: 4000,
      successCount: 1,
      failedCount: 1,
    };

    expect(formatFileProgress(entry)).toBe('Files: 2/4 (50.0%) - ETA: 4.0s - Elapsed: 4.0s - 1 failed');
  });
});
