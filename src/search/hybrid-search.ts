/**
 * Hybrid Search Engine
 *
 * Runs a query against the keyword backend, the semantic backend, or both,
 * and fuses the two rankings (see rank-fusion.ts).
 *
 * Hybrid searches ask each backend for 2 * topK candidates so that titles
 * ranked just outside one list still have a chance to rise on the other.
 * A backend failure during a hybrid search is handled according to
 * `partialFailure`:
 * - fail: the sibling call is aborted and the failing backend's error is thrown
 * - degrade: the surviving ranking is returned with `degraded` set
 *
 * Advanced (filtered) search oversamples by `advancedOversample` and filters
 * afterwards, which only suits small corpora; filters are not pushed down to
 * the backends.
 */

import {
  KeywordSearchError,
  SearchCancelledError,
  SemanticSearchError,
} from '../errors/search-error.js';
import type { PortSearchError } from '../errors/search-error.js';
import { ValidationError, getErrorMessage } from '../errors/base-error.js';
import { linkAbortSignal, raceAbort } from '../utils/async.js';
import { logger } from '../utils/logger.js';
import type { Clock } from '../cache/bounded-cache.js';
import {
  computeSourceStats,
  filterResults,
  fuseRankings,
  mergeByTitle,
  toKeywordHits,
  toSemanticHits,
  toSingleSourceResults,
} from './rank-fusion.js';
import { validateSearchParams } from './schemas.js';
import type { SearchParams } from './schemas.js';
import { resolveSearchConfig } from './search-config.js';
import { assertNever } from './types.js';
import type {
  AdvancedSearchRequest,
  DegradedInfo,
  FusedResult,
  KeywordSearchPort,
  MultiQueryResponse,
  MultiQuerySearchRequest,
  SearchConfig,
  SearchHit,
  SearchRequest,
  SearchResponse,
  SearchSource,
  SearchTiming,
  SemanticSearchPort,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface HybridSearchEngineOptions {
  keywordPort: KeywordSearchPort;
  semanticPort: SemanticSearchPort;
  config?: Partial<SearchConfig>;
  /** Time source for timingMs */
  now?: Clock;
}

interface PortOutcome {
  hits: SearchHit[];
  elapsedMs: number;
}

interface RankedOutcome {
  results: FusedResult[];
  timing: Omit<SearchTiming, 'total'>;
  degraded?: DegradedInfo;
}

// ============================================================================
// Hybrid Search Engine
// ============================================================================

export class HybridSearchEngine {
  private readonly keywordPort: KeywordSearchPort;
  private readonly semanticPort: SemanticSearchPort;
  private readonly config: SearchConfig;
  private readonly now: Clock;

  constructor(options: HybridSearchEngineOptions) {
    this.keywordPort = options.keywordPort;
    this.semanticPort = options.semanticPort;
    this.config = resolveSearchConfig(options.config);
    this.now = options.now ?? Date.now;
  }

  getConfig(): SearchConfig {
    return { ...this.config };
  }

  /**
   * Fill request defaults from the engine config and validate.
   */
  resolveParams(request: SearchRequest): SearchParams {
    return validateSearchParams({
      query: request.query,
      topK: request.topK ?? this.config.defaultTopK,
      mode: request.mode ?? this.config.defaultMode,
      alpha: request.alpha ?? this.config.defaultAlpha,
    });
  }

  /**
   * Search one query in the requested mode.
   */
  async search(request: SearchRequest): Promise<SearchResponse> {
    const params = this.resolveParams(request);
    const { signal } = request;
    const start = this.now();

    const outcome = await this.guardCancellation(params.query, signal, () => this.rank(params, signal));
    const results = outcome.results.slice(0, params.topK);

    const response: SearchResponse = {
      query: params.query,
      mode: params.mode,
      alpha: params.alpha,
      results,
      stats: computeSourceStats(results),
      fromCache: false,
      timingMs: { total: this.now() - start, ...outcome.timing },
    };
    if (outcome.degraded) {
      response.degraded = outcome.degraded;
    }

    logger.debug('Search completed', {
      query: params.query,
      mode: params.mode,
      results: results.length,
      durationMs: response.timingMs.total,
    });

    return response;
  }

  /**
   * Search with category / level filters. The query is run with
   * topK * advancedOversample and filtered down to topK survivors.
   */
  async advancedSearch(request: AdvancedSearchRequest): Promise<SearchResponse> {
    const params = this.resolveParams(request);
    const start = this.now();

    const candidates = await this.search({
      ...params,
      topK: params.topK * this.config.advancedOversample,
      signal: request.signal,
    });

    const filters = { category: request.category, level: request.level };
    const results = filterResults(candidates.results, filters, params.topK);

    return {
      ...candidates,
      results,
      stats: computeSourceStats(results),
      filters,
      timingMs: { ...candidates.timingMs, total: this.now() - start },
    };
  }

  /**
   * Run several queries and merge their results by title, keeping each
   * title's best combinedScore.
   */
  async multiQuerySearch(request: MultiQuerySearchRequest): Promise<MultiQueryResponse> {
    if (request.queries.length === 0) {
      throw new ValidationError('Multi-query search needs at least one query', ['queries: must not be empty']);
    }

    const first = this.resolveParams({ ...request, query: request.queries[0] ?? '' });
    const start = this.now();

    const responses = await Promise.all(
      request.queries.map(query =>
        this.search({ query, topK: first.topK, mode: first.mode, alpha: first.alpha, signal: request.signal })
      )
    );

    const results = mergeByTitle(responses.map(response => response.results)).slice(0, first.topK);

    return {
      queries: [...request.queries],
      mode: first.mode,
      alpha: first.alpha,
      results,
      stats: computeSourceStats(results),
      timingMs: { total: this.now() - start },
    };
  }

  // ===========================================================================
  // Modes
  // ===========================================================================

  private async rank(params: SearchParams, signal: AbortSignal | undefined): Promise<RankedOutcome> {
    switch (params.mode) {
      case 'keyword': {
        const keyword = await this.runKeyword(params.query, params.topK, signal);
        return { results: toSingleSourceResults(keyword.hits), timing: { keyword: keyword.elapsedMs } };
      }
      case 'semantic': {
        const semantic = await this.runSemantic(params.query, params.topK, signal);
        return { results: toSingleSourceResults(semantic.hits), timing: { semantic: semantic.elapsedMs } };
      }
      case 'hybrid':
        return this.rankHybrid(params, signal);
      default:
        return assertNever(params.mode);
    }
  }

  private async rankHybrid(params: SearchParams, signal: AbortSignal | undefined): Promise<RankedOutcome> {
    const candidates = params.topK * 2;
    const failFast = this.config.partialFailure === 'fail';

    // Shared by both backend calls so a failure can cancel the sibling
    const scope = new AbortController();
    const unlink = linkAbortSignal(signal, scope);
    const failure: { first?: PortSearchError } = {};

    const track = <T>(promise: Promise<T>): Promise<T> =>
      promise.catch((error: unknown) => {
        if (failFast && !failure.first && isPortSearchError(error)) {
          failure.first = error;
          scope.abort(error);
        }
        throw error;
      });

    const [keywordResult, semanticResult] = await Promise.allSettled([
      track(this.runKeyword(params.query, candidates, scope.signal)),
      track(this.runSemantic(params.query, candidates, scope.signal)),
    ]).finally(unlink);

    if (failure.first) {
      throw failure.first;
    }

    const fusionStart = this.now();

    if (keywordResult.status === 'rejected') {
      if (semanticResult.status === 'fulfilled') {
        return this.degrade('keyword', keywordResult.reason, semanticResult.value, fusionStart);
      }
      // Both failed: report the keyword failure
      throw keywordResult.reason;
    }
    if (semanticResult.status === 'rejected') {
      return this.degrade('semantic', semanticResult.reason, keywordResult.value, fusionStart);
    }

    return {
      results: fuseRankings(keywordResult.value.hits, semanticResult.value.hits, params.alpha),
      timing: {
        keyword: keywordResult.value.elapsedMs,
        semantic: semanticResult.value.elapsedMs,
        fusion: this.now() - fusionStart,
      },
    };
  }

  /**
   * Rank from the surviving backend alone, at full weight: combinedScore is
   * 1 / (rank + 1) whatever alpha was requested.
   */
  private degrade(
    failedSource: SearchSource,
    reason: unknown,
    survivor: PortOutcome,
    fusionStart: number
  ): RankedOutcome {
    const degraded: DegradedInfo = { failedSource, reason: getErrorMessage(reason) };
    logger.warn(`Hybrid search degraded: ${failedSource} backend failed`, { reason: degraded.reason });

    if (failedSource === 'semantic') {
      return {
        results: fuseRankings(survivor.hits, [], 1),
        timing: { keyword: survivor.elapsedMs, fusion: this.now() - fusionStart },
        degraded,
      };
    }
    return {
      results: fuseRankings([], survivor.hits, 0),
      timing: { semantic: survivor.elapsedMs, fusion: this.now() - fusionStart },
      degraded,
    };
  }

  // ===========================================================================
  // Backend calls
  // ===========================================================================

  private async runKeyword(query: string, topK: number, upstream: AbortSignal | undefined): Promise<PortOutcome> {
    return this.callPort('keyword', query, upstream, async signal =>
      toKeywordHits(await this.keywordPort.search(query, topK, { signal }))
    );
  }

  private async runSemantic(query: string, nResults: number, upstream: AbortSignal | undefined): Promise<PortOutcome> {
    return this.callPort('semantic', query, upstream, async signal =>
      toSemanticHits(await this.semanticPort.search(query, nResults, { signal }))
    );
  }

  /**
   * Invoke a backend with its own AbortController, linked to the upstream
   * signal and to the optional per-port deadline. Any failure is rethrown as
   * the backend's typed error.
   */
  private async callPort(
    source: SearchSource,
    query: string,
    upstream: AbortSignal | undefined,
    call: (signal: AbortSignal) => Promise<SearchHit[]>
  ): Promise<PortOutcome> {
    const controller = new AbortController();
    const unlink = linkAbortSignal(upstream, controller);
    const timeoutMs = this.config.portTimeoutMs;
    let timedOut = false;
    let timer: ReturnType<typeof setTimeout> | undefined;

    if (timeoutMs > 0) {
      timer = setTimeout(() => {
        timedOut = true;
        controller.abort(new Error(`${source} search timed out after ${timeoutMs}ms`));
      }, timeoutMs);
      timer.unref();
    }

    const start = this.now();
    try {
      const hits = await raceAbort(
        controller.signal.aborted ? Promise.reject(controller.signal.reason) : call(controller.signal),
        controller.signal
      );
      return { hits, elapsedMs: this.now() - start };
    } catch (error) {
      const message = timedOut
        ? `${capitalize(source)} search timed out after ${timeoutMs}ms`
        : `${capitalize(source)} search failed: ${getErrorMessage(error)}`;
      throw toPortError(source, query, message, error);
    } finally {
      if (timer) clearTimeout(timer);
      unlink();
    }
  }

  /**
   * Reject with SearchCancelledError when the caller's signal is aborted
   * before, during or right after `work`.
   */
  private async guardCancellation<T>(
    query: string,
    signal: AbortSignal | undefined,
    work: () => Promise<T>
  ): Promise<T> {
    if (signal?.aborted) {
      throw new SearchCancelledError(query, { cause: signal.reason });
    }

    let result: T;
    try {
      result = await work();
    } catch (error) {
      if (signal?.aborted) {
        throw new SearchCancelledError(query, { cause: error });
      }
      throw error;
    }

    if (signal?.aborted) {
      throw new SearchCancelledError(query, { cause: signal.reason });
    }
    return result;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function capitalize(value: string): string {
  return value.charAt(0).toUpperCase() + value.slice(1);
}

function isPortSearchError(error: unknown): error is PortSearchError {
  return error instanceof KeywordSearchError || error instanceof SemanticSearchError;
}

function toPortError(source: SearchSource, query: string, message: string, cause: unknown): PortSearchError {
  switch (source) {
    case 'keyword':
      return cause instanceof KeywordSearchError ? cause : new KeywordSearchError(query, message, { cause });
    case 'semantic':
      return cause instanceof SemanticSearchError ? cause : new SemanticSearchError(query, message, { cause });
    default:
      return assertNever(source);
  }
}
