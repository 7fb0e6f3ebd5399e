/**
 * Cached Search Service
 *
 * Cache-aware facade over HybridSearchEngine.
 *
 * - keyword and hybrid responses live in the `query` namespace, semantic
 *   responses in the longer-lived `semantic` namespace, filtered searches
 *   in `query` with the filters in the key
 * - a lookup never spans an await: look up, release, call the backends, write
 * - responses are deep-copied on the way in and out of the cache
 * - degraded and cancelled searches are never stored
 * - a CacheError is logged and the search recomputed without the cache
 */

import { CacheError } from '../errors/cache-error.js';
import { SearchCancelledError } from '../errors/search-error.js';
import { getErrorMessage } from '../errors/base-error.js';
import type { CacheManager, CacheHealthReport, QueryKeyOptions, UnifiedCacheStats } from '../cache/cache-manager.js';
import type { CacheLookup, Clock } from '../cache/bounded-cache.js';
import { mapWithConcurrency } from '../utils/async.js';
import { logger } from '../utils/logger.js';
import type { HybridSearchEngine } from './hybrid-search.js';
import { validateConcurrency } from './schemas.js';
import type { SearchParams } from './schemas.js';
import { resolveSearchConfig } from './search-config.js';
import type {
  AdvancedSearchRequest,
  SearchConfig,
  SearchFilters,
  SearchMode,
  SearchRequest,
  SearchResponse,
} from './types.js';

// ============================================================================
// Types
// ============================================================================

export type SearchCacheManager<TKnowledge = unknown> = CacheManager<SearchResponse, SearchResponse, TKnowledge>;

export interface CachedSearchServiceOptions<TKnowledge = unknown> {
  engine: HybridSearchEngine;
  cacheManager: SearchCacheManager<TKnowledge>;
  config?: Partial<SearchConfig>;
  now?: Clock;
}

export interface CachedSearchRequest extends SearchRequest {
  /** Defaults to true */
  useCache?: boolean;
}

export interface CachedAdvancedSearchRequest extends AdvancedSearchRequest {
  useCache?: boolean;
}

export interface BatchSearchOptions {
  topK?: number;
  mode?: SearchMode;
  alpha?: number;
  useCache?: boolean;
  /** Parallel searches; defaults to config.batchConcurrency */
  concurrency?: number;
  signal?: AbortSignal;
}

export interface BatchSearchResult {
  results: SearchResponse[];
  cacheHits: number;
  total: number;
  cacheHitRate: number;
  timingMs: {
    total: number;
    average: number;
  };
}

export interface WarmupOptions {
  topK?: number;
  mode?: SearchMode;
  alpha?: number;
}

export interface WarmupFailure {
  query: string;
  error: string;
}

export interface WarmupResult {
  warmedCount: number;
  alreadyCached: number;
  failed: WarmupFailure[];
  timingMs: number;
  cacheStatsAfter: ServiceCacheStats;
}

export interface SearchTelemetry {
  searches: number;
  cacheHits: number;
  cacheMisses: number;
  /** Searches that skipped the cache because of a CacheError */
  cacheBypasses: number;
  hitRate: number;
}

export interface ServiceCacheStats extends UnifiedCacheStats {
  service: SearchTelemetry;
}

type CacheTarget =
  | { namespace: 'query'; filters?: SearchFilters }
  | { namespace: 'semantic' };

// ============================================================================
// Cached Search Service
// ============================================================================

export class CachedSearchService<TKnowledge = unknown> {
  private readonly engine: HybridSearchEngine;
  private readonly cache: SearchCacheManager<TKnowledge>;
  private readonly config: SearchConfig;
  private readonly now: Clock;

  private searches = 0;
  private cacheHits = 0;
  private cacheMisses = 0;
  private cacheBypasses = 0;

  constructor(options: CachedSearchServiceOptions<TKnowledge>) {
    this.engine = options.engine;
    this.cache = options.cacheManager;
    this.config = resolveSearchConfig({ ...options.engine.getConfig(), ...options.config });
    this.now = options.now ?? Date.now;
  }

  /**
   * Cache-checked single search.
   */
  async search(request: CachedSearchRequest): Promise<SearchResponse> {
    const params = this.engine.resolveParams(request);
    const target: CacheTarget = params.mode === 'semantic' ? { namespace: 'semantic' } : { namespace: 'query' };

    return this.cachedCall(params, target, request, () => this.engine.search({ ...params, signal: request.signal }));
  }

  /**
   * Cache-checked filtered search; category and level are part of the key.
   */
  async advancedSearch(request: CachedAdvancedSearchRequest): Promise<SearchResponse> {
    const params = this.engine.resolveParams(request);
    const filters: SearchFilters = { category: request.category, level: request.level };

    return this.cachedCall(params, { namespace: 'query', filters }, request, () =>
      this.engine.advancedSearch({ ...params, ...filters, signal: request.signal })
    );
  }

  /**
   * Search every query with bounded parallelism. Results keep input order;
   * the first failing query rejects the batch.
   */
  async batchSearch(queries: readonly string[], options: BatchSearchOptions = {}): Promise<BatchSearchResult> {
    const start = this.now();
    const { concurrency = this.config.batchConcurrency, ...searchOptions } = options;
    validateConcurrency(concurrency);

    const results = await mapWithConcurrency(queries, concurrency, query =>
      this.search({ ...searchOptions, query })
    );

    const cacheHits = results.filter(response => response.fromCache).length;
    const total = results.length;
    const elapsed = this.now() - start;

    logger.debug('Batch search completed', { total, cacheHits, durationMs: elapsed });

    return {
      results,
      cacheHits,
      total,
      cacheHitRate: total > 0 ? cacheHits / total : 0,
      timingMs: {
        total: elapsed,
        average: total > 0 ? elapsed / total : 0,
      },
    };
  }

  /**
   * Run each query through the cache so later searches hit. A failing query
   * is logged and reported; the remaining queries still run.
   */
  async warmupCache(queries: readonly string[], options: WarmupOptions = {}): Promise<WarmupResult> {
    const start = this.now();
    let warmedCount = 0;
    let alreadyCached = 0;
    const failed: WarmupFailure[] = [];

    for (const query of queries) {
      try {
        const response = await this.search({ ...options, query, useCache: true });
        if (response.fromCache) {
          alreadyCached++;
        } else if (response.degraded) {
          failed.push({ query, error: `Not cached: ${response.degraded.failedSource} search degraded` });
        } else {
          warmedCount++;
        }
      } catch (error) {
        logger.warn(`Cache warmup failed for "${query}"`, { error: getErrorMessage(error) });
        failed.push({ query, error: getErrorMessage(error) });
      }
    }

    const timingMs = this.now() - start;
    logger.info(`Cache warmup: ${warmedCount} warmed, ${alreadyCached} already cached, ${failed.length} failed`);

    return {
      warmedCount,
      alreadyCached,
      failed,
      timingMs,
      cacheStatsAfter: this.getCacheStats(),
    };
  }

  /**
   * Get-or-load a knowledge entry through the `knowledge` namespace.
   */
  async getKnowledge(id: string, loader: (id: string) => Promise<TKnowledge>): Promise<TKnowledge> {
    const cached = this.tryCache(() => this.cache.getCachedKnowledge(id));
    if (cached?.found === true) {
      return cached.value;
    }

    const content = await loader(id);
    if (cached) {
      this.tryCache(() => this.cache.cacheKnowledge(id, content));
    }
    return content;
  }

  getCacheStats(): ServiceCacheStats {
    const lookups = this.cacheHits + this.cacheMisses;
    return {
      ...this.cache.getStats(),
      service: {
        searches: this.searches,
        cacheHits: this.cacheHits,
        cacheMisses: this.cacheMisses,
        cacheBypasses: this.cacheBypasses,
        hitRate: lookups > 0 ? this.cacheHits / lookups : 0,
      },
    };
  }

  getHealthReport(): CacheHealthReport {
    return this.cache.getHealthReport();
  }

  clearCache(): void {
    this.cache.clearAll();
    this.searches = 0;
    this.cacheHits = 0;
    this.cacheMisses = 0;
    this.cacheBypasses = 0;
  }

  // ===========================================================================
  // Internals
  // ===========================================================================

  private async cachedCall(
    params: SearchParams,
    target: CacheTarget,
    request: { useCache?: boolean; signal?: AbortSignal },
    compute: () => Promise<SearchResponse>
  ): Promise<SearchResponse> {
    const start = this.now();
    this.searches++;

    if (request.signal?.aborted) {
      throw new SearchCancelledError(params.query, { cause: request.signal.reason });
    }

    if (request.useCache === false) {
      return compute();
    }

    const lookup = this.tryCache(() => this.lookup(params, target));
    const lookupMs = this.now() - start;

    if (lookup?.found === true) {
      this.cacheHits++;
      logger.debug('Search cache hit', { query: params.query, mode: params.mode });
      return {
        ...structuredClone(lookup.value),
        alpha: params.alpha,
        fromCache: true,
        timingMs: { total: lookupMs, cacheLookup: lookupMs },
      };
    }

    if (lookup) {
      this.cacheMisses++;
    }

    const response = await compute();

    if (lookup && !response.degraded) {
      this.tryCache(() => this.store(params, target, structuredClone(response)));
    }

    return {
      ...response,
      timingMs: { ...response.timingMs, total: this.now() - start, cacheLookup: lookupMs },
    };
  }

  private lookup(params: SearchParams, target: CacheTarget): CacheLookup<SearchResponse> {
    if (target.namespace === 'semantic') {
      return this.cache.getCachedSemantic(params.query, params.topK);
    }
    return this.cache.getCachedQuery(params.query, params.mode, params.topK, this.queryKeyOptions(params, target));
  }

  private store(params: SearchParams, target: CacheTarget, response: SearchResponse): void {
    const ttlMs = this.config.resultTtlMs;
    if (target.namespace === 'semantic') {
      this.cache.cacheSemantic(params.query, params.topK, response, ttlMs);
      return;
    }
    this.cache.cacheQuery(params.query, params.mode, params.topK, response, {
      ...this.queryKeyOptions(params, target),
      ttlMs,
    });
  }

  /**
   * Alpha only changes hybrid rankings, so single-source modes share one
   * entry across alphas.
   */
  private queryKeyOptions(
    params: SearchParams,
    target: { namespace: 'query'; filters?: SearchFilters }
  ): QueryKeyOptions {
    return {
      kind: target.filters ? 'advanced' : 'search',
      alpha: params.mode === 'hybrid' ? params.alpha : undefined,
      category: target.filters?.category,
      level: target.filters?.level,
    };
  }

  /**
   * Run a cache operation, turning a CacheError into a logged bypass.
   * Returns undefined when the cache was bypassed.
   */
  private tryCache<T>(operation: () => T): T | undefined {
    try {
      return operation();
    } catch (error) {
      if (error instanceof CacheError) {
        this.cacheBypasses++;
        logger.warn('Cache bypassed', { error: error.message, namespace: error.namespace });
        return undefined;
      }
      throw error;
    }
  }
}
