/**
 * Knowledge Retrieval Cache
 *
 * Bounded LRU + TTL caching in front of a keyword / semantic rank-fusion
 * search engine.
 *
 * @example
 * ```typescript
 * import { createRetrievalService } from 'knowledge-retrieval-cache';
 *
 * const { service, dispose } = createRetrievalService({ keywordPort, semanticPort });
 *
 * const response = await service.search({ query: 'dynamic programming', topK: 5 });
 * console.log(response.results.map(r => r.title), response.fromCache);
 *
 * dispose();
 * ```
 */

import { CacheManager } from './cache/cache-manager.js';
import { getCacheConfig } from './cache/cache-config.js';
import type { CacheConfigOverrides } from './cache/cache-config.js';
import type { Clock } from './cache/bounded-cache.js';
import { HybridSearchEngine } from './search/hybrid-search.js';
import { CachedSearchService } from './search/cached-search.js';
import { getSearchConfig } from './search/search-config.js';
import type { KeywordSearchPort, SearchConfig, SearchResponse, SemanticSearchPort } from './search/types.js';
import { logger } from './utils/logger.js';

export interface RetrievalServiceOptions {
  keywordPort: KeywordSearchPort;
  semanticPort: SemanticSearchPort;
  /** Overrides applied on top of the environment cache config */
  cache?: CacheConfigOverrides;
  /** Overrides applied on top of the environment search config */
  search?: Partial<SearchConfig>;
  env?: NodeJS.ProcessEnv;
  clock?: Clock;
}

export interface RetrievalService<TKnowledge = unknown> {
  service: CachedSearchService<TKnowledge>;
  engine: HybridSearchEngine;
  cacheManager: CacheManager<SearchResponse, SearchResponse, TKnowledge>;
  /** Stop the prune timer and drop cached entries */
  dispose(): void;
}

/**
 * Wire a cache manager, engine and cached service from environment config
 * plus explicit overrides. Each call returns independent instances.
 */
export function createRetrievalService<TKnowledge = unknown>(
  options: RetrievalServiceOptions
): RetrievalService<TKnowledge> {
  const env = options.env ?? process.env;
  const cacheConfig = getCacheConfig(env);
  const searchConfig = { ...getSearchConfig(env), ...options.search };

  const cacheManager = new CacheManager<SearchResponse, SearchResponse, TKnowledge>({
    namespaces: {
      query: { ...cacheConfig.namespaces.query, ...options.cache?.namespaces?.query },
      semantic: { ...cacheConfig.namespaces.semantic, ...options.cache?.namespaces?.semantic },
      knowledge: { ...cacheConfig.namespaces.knowledge, ...options.cache?.namespaces?.knowledge },
    },
    cleanupIntervalMs: options.cache?.cleanupIntervalMs ?? cacheConfig.cleanupIntervalMs,
    clock: options.clock,
  });
  cacheManager.initialize();

  const engine = new HybridSearchEngine({
    keywordPort: options.keywordPort,
    semanticPort: options.semanticPort,
    config: searchConfig,
    now: options.clock,
  });

  const service = new CachedSearchService<TKnowledge>({
    engine,
    cacheManager,
    now: options.clock,
  });

  logger.debug('Retrieval service created', {
    mode: searchConfig.defaultMode,
    partialFailure: searchConfig.partialFailure,
  });

  return {
    service,
    engine,
    cacheManager,
    dispose: () => cacheManager.dispose(),
  };
}

export * from './cache/index.js';
export * from './search/index.js';
export * from './errors/index.js';
export { logger, createLogger, getLogger, resetLogger, isDebugEnabled, Logger } from './utils/logger.js';
export type { LogLevel, LogFormat, LogContext, LogEntry, LoggerOptions } from './utils/logger.js';
export { linkAbortSignal, mapWithConcurrency, raceAbort } from './utils/async.js';
