/**
 * Search Module
 *
 * Hybrid search fusing a keyword ranking and a semantic ranking of
 * knowledge entries, with a cache-aware service in front.
 *
 * @example
 * ```typescript
 * import { HybridSearchEngine, CachedSearchService } from './search';
 *
 * const engine = new HybridSearchEngine({ keywordPort, semanticPort });
 * const service = new CachedSearchService({ engine, cacheManager });
 *
 * // Hybrid search (default: alpha 0.5)
 * const response = await service.search({ query: 'binary search trees' });
 *
 * // Keyword-heavy ranking
 * const keywordHeavy = await service.search({ query: 'heap sort', alpha: 0.8 });
 *
 * // Filtered
 * const filtered = await service.advancedSearch({
 *   query: 'graphs',
 *   category: 'algorithms',
 *   level: 'beginner',
 * });
 * ```
 */

// Types
export type {
  SearchMode,
  SearchSource,
  PartialFailurePolicy,
  PortCallOptions,
  KeywordMatch,
  KeywordSearchPort,
  SemanticMetadata,
  SemanticMatches,
  SemanticSearchPort,
  SearchHit,
  FusedResult,
  SourceStats,
  SearchTiming,
  SearchFilters,
  DegradedInfo,
  SearchResponse,
  MultiQueryResponse,
  SearchRequest,
  AdvancedSearchRequest,
  MultiQuerySearchRequest,
  SearchConfig,
} from './types.js';
export { SEARCH_MODES, DEFAULT_SEARCH_CONFIG } from './types.js';

// Validation & config
export {
  SearchModeSchema,
  SearchParamsSchema,
  parseSearchMode,
  validateSearchParams,
} from './schemas.js';
export type { SearchParams } from './schemas.js';
export { SearchConfigSchema, getSearchConfig, resolveSearchConfig } from './search-config.js';

// Fusion
export {
  computeSourceStats,
  filterResults,
  fuseRankings,
  mergeByTitle,
  normalizedRankScore,
  toKeywordHits,
  toSemanticHits,
  toSingleSourceResults,
} from './rank-fusion.js';

// Engine & service
export { HybridSearchEngine } from './hybrid-search.js';
export type { HybridSearchEngineOptions } from './hybrid-search.js';
export { CachedSearchService } from './cached-search.js';
export type {
  BatchSearchOptions,
  BatchSearchResult,
  CachedAdvancedSearchRequest,
  CachedSearchRequest,
  CachedSearchServiceOptions,
  SearchCacheManager,
  SearchTelemetry,
  ServiceCacheStats,
  WarmupFailure,
  WarmupOptions,
  WarmupResult,
} from './cached-search.js';
