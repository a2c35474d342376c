/**
 * Search Types
 *
 * Query, candidate and result shapes for hybrid search: vector retrieval
 * followed by optional rerank and keyword boost.
 */

import { z } from 'zod';

import type { ChunkKind } from '../chunking/types.js';
import { RerankBackendSchema, type RerankBackend, type RerankErrorCode } from '../rerank/types.js';

// =============================================================================
// Query
// =============================================================================

export const RerankFailurePolicy = {
  /** Fail the query */
  THROW: 'throw',
  /** Keep vector order and report the skip */
  DEGRADE: 'degrade',
} as const;

export type RerankFailurePolicy = (typeof RerankFailurePolicy)[keyof typeof RerankFailurePolicy];

export const SearchQuerySchema = z.object({
  text: z.string().trim().min(1, 'Query text cannot be empty'),
  /** Defaults to the configured topK */
  topK: z.number().int().positive().optional(),
  rerank: RerankBackendSchema.optional(),
  keywordBoost: z.boolean().default(false),
  filter: z.record(z.union([z.string(), z.number(), z.boolean()])).optional(),
  onRerankFailure: z.enum(['throw', 'degrade']).default('throw'),
});

export type SearchQueryInput = z.input<typeof SearchQuerySchema>;

export type SearchQuery = z.infer<typeof SearchQuerySchema>;

// =============================================================================
// Candidates and Results
// =============================================================================

/**
 * A retrieved chunk moving through refinement. Created fresh per query.
 */
export interface Candidate {
  chunkId: string;
  documentId: string;
  text: string;
  source: string;
  page?: number;
  section?: string;
  sectionPath?: string;
  kind: ChunkKind;
  metadata: Record<string, string>;
  /** Current ranking score */
  score: number;
  /** Vector similarity from the store */
  baseScore: number;
  rerankScore?: number;
  keywordBoost: number;
  /** Query identifiers found in the text */
  matchedTerms: string[];
  /** Position in the store's result list */
  originalRank: number;
}

export interface SearchResult extends Candidate {
  /** 1-based position in the final list */
  rank: number;
  /** Whitespace-collapsed prefix of the text */
  snippet: string;
}

/**
 * Score descending, then store order
 */
export function compareCandidates(a: Candidate, b: Candidate): number {
  return b.score - a.score || a.originalRank - b.originalRank;
}

export type RerankStageStatus = 'applied' | 'skipped' | 'degraded';

export type KeywordBoostStageStatus = 'applied' | 'no_terms' | 'skipped';

export interface Degradation {
  stage: 'rerank';
  backend: RerankBackend;
  code: RerankErrorCode;
  message: string;
}

export interface RefinementStages {
  rerank: RerankStageStatus;
  keywordBoost: KeywordBoostStageStatus;
}

export interface SearchResponse {
  query: string;
  results: SearchResult[];
  /** Candidates requested from the store */
  fetchK: number;
  /** Candidates the store returned */
  candidateCount: number;
  /** Identifiers extracted for keyword boost */
  queryTerms: string[];
  stages: RefinementStages;
  degradations: Degradation[];
  durationMs: number;
}

// =============================================================================
// Error Types
// =============================================================================

export const SearchErrorCode = {
  INVALID_QUERY: 'INVALID_QUERY',
  EMBEDDING_FAILED: 'EMBEDDING_FAILED',
  /** Query vector length differs from the store's */
  INCOMPATIBLE_EMBEDDING: 'INCOMPATIBLE_EMBEDDING',
  STORE_FAILED: 'STORE_FAILED',
  RERANK_FAILED: 'RERANK_FAILED',
  ABORTED: 'ABORTED',
  /** Failure that came from none of the collaborators */
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type SearchErrorCode = (typeof SearchErrorCode)[keyof typeof SearchErrorCode];

export const SearchErrorCodeSchema = z.enum([
  'INVALID_QUERY',
  'EMBEDDING_FAILED',
  'INCOMPATIBLE_EMBEDDING',
  'STORE_FAILED',
  'RERANK_FAILED',
  'ABORTED',
  'INTERNAL_ERROR',
]);

export class SearchError extends Error {
  readonly code: SearchErrorCode;
  override readonly cause: Error | undefined;

  constructor(message: string, code: SearchErrorCode, options?: { cause?: Error }) {
    super(message);
    this.name = 'SearchError';
    this.code = code;
    this.cause = options?.cause;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SearchError);
    }
  }

  static fromError(error: unknown, code: SearchErrorCode): SearchError {
    if (error instanceof SearchError) {
      return error;
    }
    const cause = error instanceof Error ? error : undefined;
    const message = error instanceof Error ? error.message : String(error);
    return new SearchError(message, code, cause ? { cause } : undefined);
  }
}

export function isSearchError(error: unknown): error is SearchError {
  return error instanceof SearchError;
}
