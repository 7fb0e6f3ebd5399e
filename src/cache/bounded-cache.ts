/**
 * Bounded Cache
 *
 * Capacity-bounded LRU cache with per-entry TTL.
 *
 * Features:
 * - O(1) get, put, delete (Map insertion order is the recency order,
 *   front = least recently used)
 * - Exactly one eviction per insertion of a new key into a full cache
 * - Per-entry TTL with an optional cache-wide default; expiry is checked on read
 * - Hit/miss/eviction/expiration statistics
 * - Injectable clock for simulated time
 *
 * Every operation is synchronous, so a single call is atomic with respect to
 * concurrent async callers; nothing here is held across an await.
 */

import { EventEmitter } from 'events';
import { CacheError } from '../errors/cache-error.js';
import { ConfigurationError } from '../errors/base-error.js';

// ============================================================================
// Types
// ============================================================================

export type Clock = () => number;

export interface BoundedCacheOptions {
  /** Maximum number of entries; must be a positive integer */
  capacity: number;
  /** TTL applied when put() is called without one; omitted = never expires */
  defaultTtlMs?: number;
  /** Name used in errors and events */
  name?: string;
  clock?: Clock;
}

export interface CacheEntry<V> {
  value: V;
  /** Epoch ms after which the entry is stale; undefined = never */
  expiresAt?: number;
  createdAt: number;
}

export type CacheLookup<V> = { found: true; value: V } | { found: false };

export interface BoundedCacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  hitRate: number;
  evictions: number;
  expirations: number;
}

export interface BoundedCacheEvents<V> {
  evict: { key: string; value: V };
  expire: { key: string; value: V };
  clear: { size: number };
}

// ============================================================================
// Bounded Cache
// ============================================================================

export class BoundedCache<V> extends EventEmitter {
  private readonly entries: Map<string, CacheEntry<V>> = new Map();
  private readonly capacity: number;
  private readonly defaultTtlMs: number | undefined;
  private readonly clock: Clock;
  readonly name: string;

  // Statistics
  private hits = 0;
  private misses = 0;
  private evictions = 0;
  private expirations = 0;

  constructor(options: BoundedCacheOptions) {
    super();
    this.name = options.name ?? 'cache';

    if (!Number.isInteger(options.capacity) || options.capacity <= 0) {
      throw new ConfigurationError(
        `Cache "${this.name}" capacity must be a positive integer, got ${options.capacity}`,
        { setting: 'capacity' }
      );
    }
    if (options.defaultTtlMs !== undefined && !isValidTtl(options.defaultTtlMs)) {
      throw new ConfigurationError(
        `Cache "${this.name}" default TTL must be a positive number of milliseconds, got ${options.defaultTtlMs}`,
        { setting: 'defaultTtlMs' }
      );
    }

    this.capacity = options.capacity;
    this.defaultTtlMs = options.defaultTtlMs;
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Look up a key. Expired entries are removed and counted as misses;
   * live entries are promoted to most recently used.
   */
  get(key: string): CacheLookup<V> {
    const entry = this.entries.get(key);

    if (!entry) {
      this.misses++;
      return { found: false };
    }

    if (this.isExpired(entry)) {
      this.entries.delete(key);
      this.expirations++;
      this.misses++;
      this.emit('expire', { key, value: entry.value });
      return { found: false };
    }

    // Move to end (most recently used)
    this.entries.delete(key);
    this.entries.set(key, entry);

    this.hits++;
    return { found: true, value: entry.value };
  }

  /**
   * Insert or replace a value. A replaced key is promoted and never
   * triggers eviction; a new key evicts the LRU entry when full.
   */
  put(key: string, value: V, ttlMs?: number): void {
    const ttl = ttlMs ?? this.defaultTtlMs;
    if (ttl !== undefined && !isValidTtl(ttl)) {
      throw new CacheError(`Invalid TTL ${ttl} for key in cache "${this.name}"`, {
        namespace: this.name,
      });
    }

    const now = this.clock();
    const entry: CacheEntry<V> = {
      value,
      createdAt: now,
      expiresAt: ttl === undefined ? undefined : now + ttl,
    };

    if (this.entries.has(key)) {
      this.entries.delete(key);
    } else if (this.entries.size >= this.capacity) {
      this.evictLRU();
    }

    this.entries.set(key, entry);
  }

  /**
   * Expiry-aware presence check. Does not affect recency or statistics.
   */
  has(key: string): boolean {
    const entry = this.entries.get(key);
    return entry !== undefined && !this.isExpired(entry);
  }

  delete(key: string): boolean {
    return this.entries.delete(key);
  }

  /**
   * Remove all entries and reset hit/miss counters.
   */
  clear(): void {
    const size = this.entries.size;
    this.entries.clear();
    this.hits = 0;
    this.misses = 0;
    this.emit('clear', { size });
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Keys from least to most recently used (expired entries included until
   * they are read or pruned).
   */
  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  /**
   * Remove expired entries
   */
  prune(): number {
    let pruned = 0;
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.entries.delete(key);
        this.expirations++;
        pruned++;
        this.emit('expire', { key, value: entry.value });
      }
    }
    return pruned;
  }

  getStats(): BoundedCacheStats {
    const lookups = this.hits + this.misses;
    return {
      size: this.entries.size,
      capacity: this.capacity,
      hits: this.hits,
      misses: this.misses,
      hitRate: lookups > 0 ? this.hits / lookups : 0,
      evictions: this.evictions,
      expirations: this.expirations,
    };
  }

  dispose(): void {
    this.clear();
    this.removeAllListeners();
  }

  private isExpired(entry: CacheEntry<V>): boolean {
    return entry.expiresAt !== undefined && this.clock() >= entry.expiresAt;
  }

  private evictLRU(): void {
    // Map maintains insertion order, first entry is LRU
    const first = this.entries.entries().next();
    if (first.done) return;

    const [key, entry] = first.value;
    this.entries.delete(key);
    this.evictions++;
    this.emit('evict', { key, value: entry.value });
  }
}

function isValidTtl(ttl: number): boolean {
  return Number.isFinite(ttl) && ttl > 0;
}
