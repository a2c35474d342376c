/**
 * Search Module
 *
 * @example
 * ```typescript
 * import { SearchService } from '@techdoc-rag/lib';
 *
 * const service = new SearchService({ embedder, store });
 * const { results } = await service.search({ text: 'GPIOx_CRL mode bits', keywordBoost: true, topK: 3 });
 * for (const r of results) {
 *   console.log(r.rank, r.score.toFixed(4), r.section, r.matchedTerms);
 * }
 * ```
 */

export {
  RerankFailurePolicy,
  SearchQuerySchema,
  type SearchQueryInput,
  type SearchQuery,
  type Candidate,
  type SearchResult,
  compareCandidates,
  type RerankStageStatus,
  type KeywordBoostStageStatus,
  type Degradation,
  type RefinementStages,
  type SearchResponse,
  SearchErrorCode,
  SearchErrorCodeSchema,
  SearchError,
  isSearchError,
} from './types.js';

export {
  extractQueryIdentifiers,
  identifierMatcher,
  findBoostRegion,
  applyKeywordBoost,
  type BoostRegion,
  type KeywordBoostResult,
} from './keyword-boost.js';

export {
  computeFetchK,
  candidatesFromMatches,
  rerankCandidates,
  refine,
  type RefineOptions,
  type RefineResult,
} from './refiner.js';

export {
  SearchService,
  makeSnippet,
  type SearchServiceOptions,
  type SearchOptions,
} from './search-service.js';
