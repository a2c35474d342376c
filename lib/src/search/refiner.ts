/**
 * Hybrid Search Refiner
 *
 * Turns store matches into ranked candidates: optional rerank, then
 * optional keyword boost, then truncation to topK.
 */

import type { BoostTiers } from '../config/types.js';
import type { Logger } from '../logging/logger.js';
import { RerankError, RerankErrorCode, isRerankError, type Reranker } from '../rerank/types.js';
import type { StoreMatch } from '../vector-store/types.js';
import { applyKeywordBoost } from './keyword-boost.js';
import {
  RerankFailurePolicy,
  compareCandidates,
  type Candidate,
  type Degradation,
  type RefinementStages,
} from './types.js';

/**
 * Candidates requested from the store. Refinement stages need a wider pool
 * than the final result count.
 */
export function computeFetchK(
  topK: number,
  expansionFactor: number,
  options: { rerank: boolean; keywordBoost: boolean }
): number {
  return options.rerank || options.keywordBoost ? topK * expansionFactor : topK;
}

export function candidatesFromMatches(matches: readonly StoreMatch[]): Candidate[] {
  return matches.map(({ score, payload }, index) => ({
    chunkId: payload.chunkId,
    documentId: payload.documentId,
    text: payload.text,
    source: payload.source,
    ...(payload.page !== undefined ? { page: payload.page } : {}),
    ...(payload.section !== undefined ? { section: payload.section } : {}),
    ...(payload.sectionPath !== undefined ? { sectionPath: payload.sectionPath } : {}),
    kind: payload.kind,
    metadata: { ...payload.metadata },
    score,
    baseScore: score,
    keywordBoost: 0,
    matchedTerms: [],
    originalRank: index,
  }));
}

export interface RefineOptions {
  query: string;
  topK: number;
  reranker?: Reranker | undefined;
  keywordBoost: boolean;
  boosts: BoostTiers;
  onRerankFailure: RerankFailurePolicy;
  signal?: AbortSignal | undefined;
  logger: Logger;
}

export interface RefineResult {
  candidates: Candidate[];
  queryTerms: string[];
  stages: RefinementStages;
  degradations: Degradation[];
}

/**
 * Rerank scores replace the vector score; candidates are then re-sorted
 * by (score desc, originalRank asc).
 *
 * @throws {RerankError} when reranking fails under the `throw` policy
 */
export async function rerankCandidates(
  candidates: readonly Candidate[],
  query: string,
  reranker: Reranker,
  signal?: AbortSignal
): Promise<Candidate[]> {
  let scores: number[];
  try {
    scores = await reranker.score(
      query,
      candidates.map((c) => c.text),
      signal ? { signal } : {}
    );
  } catch (error) {
    throw RerankError.fromError(error, reranker.backend);
  }
  if (scores.length !== candidates.length) {
    throw new RerankError(
      `Expected ${candidates.length} rerank scores, received ${scores.length}`,
      RerankErrorCode.INVALID_RESPONSE,
      reranker.backend
    );
  }

  return candidates
    .map((candidate, i) => {
      const score = scores[i]!;
      return { ...candidate, score, rerankScore: score };
    })
    .sort(compareCandidates);
}

export async function refine(
  initial: readonly Candidate[],
  options: RefineOptions
): Promise<RefineResult> {
  const { logger } = options;
  let candidates = [...initial];
  const stages: RefinementStages = { rerank: 'skipped', keywordBoost: 'skipped' };
  const degradations: Degradation[] = [];
  let queryTerms: string[] = [];

  if (options.reranker && candidates.length > 0) {
    try {
      candidates = await rerankCandidates(candidates, options.query, options.reranker, options.signal);
      stages.rerank = 'applied';
    } catch (error) {
      const aborted = options.signal?.aborted ?? false;
      if (aborted || options.onRerankFailure === RerankFailurePolicy.THROW || !isRerankError(error)) {
        throw error;
      }
      stages.rerank = 'degraded';
      degradations.push({
        stage: 'rerank',
        backend: error.backend,
        code: error.code,
        message: error.message,
      });
      logger.warn('Rerank failed, keeping vector order', { backend: error.backend, code: error.code });
    }
  }

  if (options.keywordBoost) {
    const boosted = applyKeywordBoost(candidates, options.query, options.boosts);
    candidates = boosted.candidates;
    queryTerms = boosted.terms;
    stages.keywordBoost = boosted.status;
    logger.debug('Keyword boost', { terms: boosted.terms, status: boosted.status });
  }

  return { candidates: candidates.slice(0, options.topK), queryTerms, stages, degradations };
}
