/**
 * Search Service
 *
 * Embeds the query, retrieves an expanded candidate pool from the store
 * and refines it into the final ranked results.
 */

import type { SearchConfig } from '../config/types.js';
import { createDefaultSearchConfig } from '../config/types.js';
import { EmbeddingError } from '../embeddings/types.js';
import type { EmbeddingProvider } from '../embeddings/types.js';
import type { Logger } from '../logging/logger.js';
import { resolveLogger } from '../logging/logger.js';
import type { RerankBackend, Reranker } from '../rerank/types.js';
import { RerankError } from '../rerank/types.js';
import type { VectorStore } from '../vector-store/types.js';
import { VectorStoreError } from '../vector-store/types.js';
import { candidatesFromMatches, computeFetchK, refine } from './refiner.js';
import {
  SearchError,
  SearchErrorCode,
  SearchQuerySchema,
  type Candidate,
  type SearchQueryInput,
  type SearchResponse,
  type SearchResult,
} from './types.js';

export interface SearchServiceOptions {
  embedder: EmbeddingProvider;
  store: VectorStore;
  config?: Readonly<SearchConfig>;
  /** Resolves the reranker for a requested backend */
  rerankerFor?: (backend: RerankBackend) => Reranker;
  logger?: Logger;
}

export interface SearchOptions {
  signal?: AbortSignal;
}

export function makeSnippet(text: string, length: number): string {
  return text.replace(/\s+/g, ' ').trim().slice(0, length);
}

function collaboratorCode(error: unknown): SearchErrorCode {
  if (error instanceof EmbeddingError) {
    return SearchErrorCode.EMBEDDING_FAILED;
  }
  if (error instanceof VectorStoreError) {
    return SearchErrorCode.STORE_FAILED;
  }
  if (error instanceof RerankError) {
    return SearchErrorCode.RERANK_FAILED;
  }
  return SearchErrorCode.INTERNAL_ERROR;
}

/**
 * @example
 * ```typescript
 * const service = new SearchService({ embedder, store, rerankerFor: (b) => createReranker(b, config.rerank) });
 * const response = await service.search({ text: 'AFIO_MAPR reset value', rerank: 'local', keywordBoost: true });
 * ```
 */
export class SearchService {
  private readonly embedder: EmbeddingProvider;
  private readonly store: VectorStore;
  private readonly config: Readonly<SearchConfig>;
  private readonly rerankerFor: ((backend: RerankBackend) => Reranker) | undefined;
  private readonly logger: Logger;

  constructor(options: SearchServiceOptions) {
    this.embedder = options.embedder;
    this.store = options.store;
    this.config = options.config ?? createDefaultSearchConfig();
    this.rerankerFor = options.rerankerFor;
    this.logger = resolveLogger('search', options.logger);
  }

  /**
   * @throws {SearchError}
   */
  async search(input: SearchQueryInput, options: SearchOptions = {}): Promise<SearchResponse> {
    const startTime = Date.now();
    const { signal } = options;

    const parsed = SearchQuerySchema.safeParse(input);
    if (!parsed.success) {
      throw new SearchError(
        parsed.error.issues.map((issue) => issue.message).join('; '),
        SearchErrorCode.INVALID_QUERY
      );
    }
    const query = parsed.data;
    const topK = query.topK ?? this.config.topK;
    const fetchK = computeFetchK(topK, this.config.candidateExpansionFactor, {
      rerank: query.rerank !== undefined,
      keywordBoost: query.keywordBoost,
    });

    try {
      signal?.throwIfAborted();
      const reranker = query.rerank !== undefined ? this.resolveReranker(query.rerank) : undefined;

      const vector = await this.embedder.embedQuery(query.text, signal ? { signal } : {});
      await this.checkDimensions(vector.length);

      signal?.throwIfAborted();
      const matches = await this.store.search(vector, fetchK, query.filter, signal ? { signal } : {});

      signal?.throwIfAborted();
      const refined = await refine(candidatesFromMatches(matches), {
        query: query.text,
        topK,
        reranker,
        keywordBoost: query.keywordBoost,
        boosts: this.config.boosts,
        onRerankFailure: query.onRerankFailure,
        signal,
        logger: this.logger,
      });

      const response: SearchResponse = {
        query: query.text,
        results: refined.candidates.map((candidate, index) => this.toResult(candidate, index)),
        fetchK,
        candidateCount: matches.length,
        queryTerms: refined.queryTerms,
        stages: refined.stages,
        degradations: refined.degradations,
        durationMs: Date.now() - startTime,
      };

      this.logger.debug('Search completed', {
        fetchK,
        candidates: matches.length,
        results: response.results.length,
        durationMs: response.durationMs,
      });
      return response;
    } catch (error) {
      throw this.wrapError(error, signal);
    }
  }

  private resolveReranker(backend: RerankBackend): Reranker {
    if (!this.rerankerFor) {
      throw new SearchError(`No reranker configured for ${backend}`, SearchErrorCode.RERANK_FAILED);
    }
    try {
      return this.rerankerFor(backend);
    } catch (error) {
      throw SearchError.fromError(error, SearchErrorCode.RERANK_FAILED);
    }
  }

  private async checkDimensions(queryDimensions: number): Promise<void> {
    const storeDimensions = await this.store.getDimensions();
    if (storeDimensions !== null && storeDimensions !== queryDimensions) {
      throw new SearchError(
        `Query embedding has ${queryDimensions} dimensions but the store holds ${storeDimensions}; ` +
          `was it built with a different model than ${this.embedder.model}?`,
        SearchErrorCode.INCOMPATIBLE_EMBEDDING
      );
    }
  }

  private toResult(candidate: Candidate, index: number): SearchResult {
    return {
      ...candidate,
      rank: index + 1,
      snippet: makeSnippet(candidate.text, this.config.snippetLength),
    };
  }

  private wrapError(error: unknown, signal: AbortSignal | undefined): SearchError {
    if (error instanceof SearchError) {
      return error;
    }
    if (signal?.aborted) {
      const cause = error instanceof Error ? error : undefined;
      return new SearchError('Search aborted', SearchErrorCode.ABORTED, cause ? { cause } : undefined);
    }
    return SearchError.fromError(error, collaboratorCode(error));
  }
}
