/**
 * Candidate and collaborator stand-ins for search tests
 */

import { vi } from 'vitest';

import type { Candidate } from '../../lib/src/search/index.js';
import type { Reranker } from '../../lib/src/rerank/index.js';

export function candidate(rank: number, score: number, text: string): Candidate {
  return {
    chunkId: `rm_chunk_${rank}`,
    documentId: 'rm',
    text,
    source: 'rm.md',
    kind: 'regular',
    metadata: {},
    score,
    baseScore: score,
    keywordBoost: 0,
    matchedTerms: [],
    originalRank: rank,
  };
}

export function stubReranker(impl: Reranker['score']) {
  const score = vi.fn(impl);
  const reranker: Reranker = { backend: 'local', score };
  return { reranker, score };
}

export const AFIO_MAPR_DEFINITION = [
  'REGISTER DEFINITION: AFIO_MAPR - Complete bit field specification',
  '[KEY: TABLE:register_bitfields | AFIO_MAPR | offset:0x04]',
  '',
  '| Bits | Field |',
].join('\n');
