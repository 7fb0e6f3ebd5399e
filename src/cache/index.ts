/**
 * Cache Module
 *
 * Bounded LRU + TTL caches for retrieval results:
 * - BoundedCache: a single capacity-bounded namespace
 * - CacheManager: the query / semantic / knowledge namespaces and key derivation
 *
 * Usage:
 * ```typescript
 * import { CacheManager } from './cache';
 *
 * const cache = new CacheManager<SearchResponse, SearchResponse, KnowledgeEntry>();
 * cache.cacheKnowledge('kb-42', entry);
 *
 * const lookup = cache.getCachedKnowledge('kb-42');
 * if (lookup.found) {
 *   render(lookup.value);
 * }
 * ```
 */

export { BoundedCache } from './bounded-cache.js';
export type {
  BoundedCacheOptions,
  BoundedCacheStats,
  BoundedCacheEvents,
  CacheEntry,
  CacheLookup,
  Clock,
} from './bounded-cache.js';

export { CacheManager } from './cache-manager.js';
export type {
  CacheManagerOptions,
  CacheHealthReport,
  QueryKeyOptions,
  UnifiedCacheStats,
} from './cache-manager.js';

export { deriveCacheKey, encodeKeyPart, encodeKeyTuple } from './cache-key.js';
export type { KeyPart } from './cache-key.js';

export {
  CACHE_NAMESPACES,
  DEFAULT_CACHE_CONFIG,
  CacheManagerConfigSchema,
  getCacheConfig,
  resolveCacheConfig,
} from './cache-config.js';
export type {
  CacheConfigOverrides,
  CacheManagerConfig,
  CacheNamespaceConfig,
  CacheNamespaceName,
} from './cache-config.js';
