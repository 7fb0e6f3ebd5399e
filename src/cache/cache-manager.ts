/**
 * Cache Manager
 *
 * Owns the three retrieval caches and derives their keys:
 * - query: fused / keyword search responses (200 entries, 1 h)
 * - semantic: semantic-only search responses (100 entries, 2 h)
 * - knowledge: knowledge entry content by id (50 entries, 24 h)
 *
 * Each namespace is an independent BoundedCache; the manager adds key
 * derivation, aggregate statistics, a health report and an optional
 * periodic prune of expired entries.
 */

import { EventEmitter } from 'events';
import { BoundedCache } from './bounded-cache.js';
import type { BoundedCacheEvents, BoundedCacheStats, CacheLookup, Clock } from './bounded-cache.js';
import { CACHE_NAMESPACES, resolveCacheConfig } from './cache-config.js';
import type { CacheConfigOverrides, CacheManagerConfig, CacheNamespaceName } from './cache-config.js';
import { deriveCacheKey } from './cache-key.js';
import type { KeyPart } from './cache-key.js';
import type { SearchMode } from '../search/types.js';
import { logger } from '../utils/logger.js';

// ============================================================================
// Types
// ============================================================================

export interface CacheManagerOptions extends CacheConfigOverrides {
  clock?: Clock;
}

/**
 * Discriminators that split query-cache entries beyond (query, mode, topK)
 */
export interface QueryKeyOptions {
  /** Advanced searches oversample before filtering, so they never share entries with plain ones */
  kind?: 'search' | 'advanced';
  alpha?: number;
  category?: string;
  level?: string;
}

export interface UnifiedCacheStats {
  query: BoundedCacheStats;
  semantic: BoundedCacheStats;
  knowledge: BoundedCacheStats;
  totalSize: number;
  overall: {
    hits: number;
    misses: number;
    hitRate: number;
  };
}

export interface CacheHealthReport {
  rating: 'excellent' | 'good';
  status: 'healthy' | 'warning';
  issues: string[];
  recommendations: string[];
}

/** Lookups needed before a low hit rate counts as an issue */
const MIN_LOOKUPS_FOR_HIT_RATE = 20;

// ============================================================================
// Cache Manager
// ============================================================================

export class CacheManager<TQuery = unknown, TSemantic = unknown, TKnowledge = unknown> extends EventEmitter {
  private readonly config: CacheManagerConfig;

  // Cache instances
  private readonly queryCache: BoundedCache<TQuery>;
  private readonly semanticCache: BoundedCache<TSemantic>;
  private readonly knowledgeCache: BoundedCache<TKnowledge>;

  private cleanupInterval: ReturnType<typeof setInterval> | null = null;

  constructor(options: CacheManagerOptions = {}) {
    super();
    const { clock, ...overrides } = options;
    this.config = resolveCacheConfig(overrides);

    const { query, semantic, knowledge } = this.config.namespaces;
    this.queryCache = new BoundedCache<TQuery>({ name: 'query', ...query, clock });
    this.semanticCache = new BoundedCache<TSemantic>({ name: 'semantic', ...semantic, clock });
    this.knowledgeCache = new BoundedCache<TKnowledge>({ name: 'knowledge', ...knowledge, clock });

    this.setupEventForwarding();
  }

  /**
   * Start the periodic prune timer (no-op when cleanupIntervalMs is 0)
   */
  initialize(): void {
    if (this.cleanupInterval || this.config.cleanupIntervalMs <= 0) return;

    this.cleanupInterval = setInterval(() => {
      const pruned = this.pruneExpired();
      if (pruned > 0) {
        logger.debug(`Pruned ${pruned} expired cache entries`);
      }
    }, this.config.cleanupIntervalMs);
    this.cleanupInterval.unref();
  }

  // ===========================================================================
  // Key Derivation
  // ===========================================================================

  /**
   * Stable key for an argument tuple within a namespace. Throws CacheError
   * when an argument has no stable encoding.
   */
  deriveKey(namespace: CacheNamespaceName, ...args: KeyPart[]): string {
    return deriveCacheKey(namespace, args);
  }

  // ===========================================================================
  // Query Cache API
  // ===========================================================================

  cacheQuery(
    query: string,
    mode: SearchMode,
    topK: number,
    result: TQuery,
    options: QueryKeyOptions & { ttlMs?: number } = {}
  ): string {
    const key = this.queryKey(query, mode, topK, options);
    this.queryCache.put(key, result, options.ttlMs);
    return key;
  }

  getCachedQuery(query: string, mode: SearchMode, topK: number, options: QueryKeyOptions = {}): CacheLookup<TQuery> {
    return this.queryCache.get(this.queryKey(query, mode, topK, options));
  }

  private queryKey(query: string, mode: SearchMode, topK: number, options: QueryKeyOptions): string {
    return this.deriveKey(
      'query',
      query,
      mode,
      topK,
      options.kind ?? 'search',
      options.alpha ?? null,
      options.category ?? null,
      options.level ?? null
    );
  }

  // ===========================================================================
  // Semantic Cache API
  // ===========================================================================

  cacheSemantic(query: string, nResults: number, result: TSemantic, ttlMs?: number): string {
    const key = this.deriveKey('semantic', query, nResults);
    this.semanticCache.put(key, result, ttlMs);
    return key;
  }

  getCachedSemantic(query: string, nResults: number): CacheLookup<TSemantic> {
    return this.semanticCache.get(this.deriveKey('semantic', query, nResults));
  }

  // ===========================================================================
  // Knowledge Cache API
  // ===========================================================================

  cacheKnowledge(id: string, content: TKnowledge, ttlMs?: number): string {
    const key = this.deriveKey('knowledge', id);
    this.knowledgeCache.put(key, content, ttlMs);
    return key;
  }

  getCachedKnowledge(id: string): CacheLookup<TKnowledge> {
    return this.knowledgeCache.get(this.deriveKey('knowledge', id));
  }

  // ===========================================================================
  // Global Operations
  // ===========================================================================

  /**
   * Clear all caches
   */
  clearAll(): void {
    this.queryCache.clear();
    this.semanticCache.clear();
    this.knowledgeCache.clear();
    this.emit('clear:all');
    logger.debug('All caches cleared');
  }

  /**
   * Remove expired entries from every namespace
   */
  pruneExpired(): number {
    return this.queryCache.prune() + this.semanticCache.prune() + this.knowledgeCache.prune();
  }

  getStats(): UnifiedCacheStats {
    const query = this.queryCache.getStats();
    const semantic = this.semanticCache.getStats();
    const knowledge = this.knowledgeCache.getStats();

    const hits = query.hits + semantic.hits + knowledge.hits;
    const misses = query.misses + semantic.misses + knowledge.misses;
    const lookups = hits + misses;

    return {
      query,
      semantic,
      knowledge,
      totalSize: query.size + semantic.size + knowledge.size,
      overall: {
        hits,
        misses,
        hitRate: lookups > 0 ? hits / lookups : 0,
      },
    };
  }

  /**
   * Format statistics for display
   */
  formatStats(): string {
    const stats = this.getStats();
    const lines = [
      '='.repeat(50),
      'RETRIEVAL CACHE STATISTICS',
      '='.repeat(50),
      `Overall Hit Rate: ${(stats.overall.hitRate * 100).toFixed(1)}%`,
      `Total Entries: ${stats.totalSize}`,
      '-'.repeat(50),
    ];

    for (const namespace of CACHE_NAMESPACES) {
      const ns = stats[namespace];
      lines.push(
        `${namespace.padEnd(10)} ${String(ns.size).padStart(4)}/${ns.capacity} entries, ` +
          `hit rate ${(ns.hitRate * 100).toFixed(1)}%, ${ns.evictions} evicted, ${ns.expirations} expired`
      );
    }

    lines.push('='.repeat(50));
    return lines.join('\n');
  }

  /**
   * Rate cache effectiveness and suggest tuning.
   */
  getHealthReport(): CacheHealthReport {
    const stats = this.getStats();
    const issues: string[] = [];
    const recommendations: string[] = [];

    const queryLookups = stats.query.hits + stats.query.misses;
    if (queryLookups >= MIN_LOOKUPS_FOR_HIT_RATE && stats.query.hitRate < 0.3) {
      issues.push(`Low query cache hit rate: ${(stats.query.hitRate * 100).toFixed(1)}%`);
      recommendations.push('Increase query cache capacity or lengthen its TTL');
    }

    for (const namespace of CACHE_NAMESPACES) {
      const ns = stats[namespace];
      const lookups = ns.hits + ns.misses;
      if (lookups > 0 && ns.evictions / lookups > 0.5) {
        issues.push(`High ${namespace} eviction rate: ${((ns.evictions / lookups) * 100).toFixed(1)}%`);
        recommendations.push(`Increase ${namespace} cache capacity (currently ${ns.capacity})`);
      }
    }

    return {
      rating: stats.query.hitRate > 0.5 ? 'excellent' : 'good',
      status: issues.length > 0 ? 'warning' : 'healthy',
      issues,
      recommendations,
    };
  }

  getConfig(): CacheManagerConfig {
    return {
      namespaces: {
        query: { ...this.config.namespaces.query },
        semantic: { ...this.config.namespaces.semantic },
        knowledge: { ...this.config.namespaces.knowledge },
      },
      cleanupIntervalMs: this.config.cleanupIntervalMs,
    };
  }

  /**
   * Stop the prune timer and drop every entry
   */
  dispose(): void {
    if (this.cleanupInterval) {
      clearInterval(this.cleanupInterval);
      this.cleanupInterval = null;
    }

    this.queryCache.dispose();
    this.semanticCache.dispose();
    this.knowledgeCache.dispose();
    this.removeAllListeners();
    logger.debug('Cache manager disposed');
  }

  /**
   * Setup event forwarding from individual caches
   */
  private setupEventForwarding(): void {
    const forward = (namespace: CacheNamespaceName, cache: EventEmitter): void => {
      cache.on('evict', (event: BoundedCacheEvents<unknown>['evict']) => {
        this.emit(`${namespace}:evict`, { key: event.key });
      });
      cache.on('expire', (event: BoundedCacheEvents<unknown>['expire']) => {
        this.emit(`${namespace}:expire`, { key: event.key });
      });
    };

    forward('query', this.queryCache);
    forward('semantic', this.semanticCache);
    forward('knowledge', this.knowledgeCache);
  }
}
