/**
 * BoundedCache Tests
 */

import { describe, beforeEach, it, expect, jest } from '@jest/globals';
import { BoundedCache } from '../../src/cache/bounded-cache.js';
import { CacheError } from '../../src/errors/cache-error.js';
import { ConfigurationError } from '../../src/errors/base-error.js';

describe('BoundedCache', () => {
  let now: number;
  const clock = () => now;

  beforeEach(() => {
    now = 1_000;
  });

  describe('construction', () => {
    it.each([0, -1, 1.5, Number.NaN])('should reject capacity %p', capacity => {
      expect(() => new BoundedCache({ capacity })).toThrow(ConfigurationError);
    });

    it('should reject a non-positive default TTL', () => {
      expect(() => new BoundedCache({ capacity: 2, defaultTtlMs: 0 })).toThrow(ConfigurationError);
    });
  });

  describe('capacity and LRU order', () => {
    it('should never hold more entries than its capacity', () => {
      const cache = new BoundedCache<number>({ capacity: 3 });
      for (let i = 0; i < 10; i++) {
        cache.put(`k${i}`, i);
        expect(cache.size).toBeLessThanOrEqual(3);
      }
      expect(cache.size).toBe(3);
      expect(cache.getStats().evictions).toBe(7);
    });

    it('should evict the least recently used entry', () => {
      const cache = new BoundedCache<string>({ capacity: 3 });
      cache.put('A', 'a');
      cache.put('B', 'b');
      cache.put('C', 'c');

      expect(cache.get('A')).toEqual({ found: true, value: 'a' });
      cache.put('D', 'd');

      expect(cache.has('B')).toBe(false);
      expect(cache.has('A')).toBe(true);
      expect(cache.keys()).toEqual(['C', 'A', 'D']);
    });

    it('should keep a and c after get(a) then put(c) at capacity 2', () => {
      const cache = new BoundedCache<number>({ capacity: 2 });
      cache.put('a', 1);
      cache.put('b', 2);
      cache.get('a');
      cache.put('c', 3);

      expect(cache.get('b')).toEqual({ found: false });
      expect(cache.get('a')).toEqual({ found: true, value: 1 });
      expect(cache.get('c')).toEqual({ found: true, value: 3 });
    });

    it('should replace an existing key without evicting', () => {
      const cache = new BoundedCache<number>({ capacity: 2 });
      cache.put('a', 1);
      cache.put('b', 2);
      cache.put('a', 10);

      expect(cache.size).toBe(2);
      expect(cache.getStats().evictions).toBe(0);
      expect(cache.keys()).toEqual(['b', 'a']);
      expect(cache.get('a')).toEqual({ found: true, value: 10 });
    });

    it('should emit evict with the victim', () => {
      const cache = new BoundedCache<number>({ capacity: 1 });
      const onEvict = jest.fn();
      cache.on('evict', onEvict);

      cache.put('a', 1);
      cache.put('b', 2);

      expect(onEvict).toHaveBeenCalledTimes(1);
      expect(onEvict).toHaveBeenCalledWith({ key: 'a', value: 1 });
    });
  });

  describe('TTL', () => {
    it('should hit before the TTL and miss after it', () => {
      const cache = new BoundedCache<string>({ capacity: 5, clock });
      cache.put('k', 'v', 1_000);

      expect(cache.get('k')).toEqual({ found: true, value: 'v' });
      expect(cache.size).toBe(1);

      now = 2_001;
      expect(cache.get('k')).toEqual({ found: false });
      expect(cache.size).toBe(0);
    });

    it('should treat an entry as expired exactly at its deadline', () => {
      const cache = new BoundedCache<string>({ capacity: 5, clock });
      cache.put('k', 'v', 500);

      now = 1_499;
      expect(cache.has('k')).toBe(true);
      now = 1_500;
      expect(cache.has('k')).toBe(false);
    });

    it('should apply the default TTL when put() has none', () => {
      const cache = new BoundedCache<string>({ capacity: 5, defaultTtlMs: 100, clock });
      cache.put('k', 'v');

      now = 1_100;
      expect(cache.get('k').found).toBe(false);
    });

    it('should never expire entries without any TTL', () => {
      const cache = new BoundedCache<string>({ capacity: 5, clock });
      cache.put('k', 'v');

      now = Number.MAX_SAFE_INTEGER;
      expect(cache.get('k').found).toBe(true);
    });

    it('should count an expired read as a miss and an expiration', () => {
      const cache = new BoundedCache<string>({ capacity: 5, clock });
      const onExpire = jest.fn();
      cache.on('expire', onExpire);
      cache.put('k', 'v', 10);

      now = 2_000;
      cache.get('k');

      const stats = cache.getStats();
      expect(stats.misses).toBe(1);
      expect(stats.hits).toBe(0);
      expect(stats.expirations).toBe(1);
      expect(onExpire).toHaveBeenCalledWith({ key: 'k', value: 'v' });
    });

    it.each([0, -5, Number.NaN, Number.POSITIVE_INFINITY])('should reject TTL %p with CacheError', ttl => {
      const cache = new BoundedCache<string>({ capacity: 5 });
      expect(() => cache.put('k', 'v', ttl)).toThrow(CacheError);
      expect(cache.size).toBe(0);
    });

    it('should prune only expired entries', () => {
      const cache = new BoundedCache<string>({ capacity: 5, clock });
      cache.put('short', 's', 10);
      cache.put('long', 'l', 10_000);
      cache.put('forever', 'f');

      now = 1_500;
      expect(cache.prune()).toBe(1);
      expect(cache.keys()).toEqual(['long', 'forever']);
    });
  });

  describe('statistics', () => {
    it('should report a zero hit rate before any lookup', () => {
      const cache = new BoundedCache<string>({ capacity: 4 });
      expect(cache.getStats()).toEqual({
        size: 0,
        capacity: 4,
        hits: 0,
        misses: 0,
        hitRate: 0,
        evictions: 0,
        expirations: 0,
      });
    });

    it('should compute the hit rate from gets', () => {
      const cache = new BoundedCache<string>({ capacity: 4 });
      cache.put('a', 'x');
      cache.get('a');
      cache.get('a');
      cache.get('a');
      cache.get('missing');

      const stats = cache.getStats();
      expect(stats.hits).toBe(3);
      expect(stats.misses).toBe(1);
      expect(stats.hitRate).toBe(0.75);
    });

    it('should not touch counters or recency on has()', () => {
      const cache = new BoundedCache<string>({ capacity: 2 });
      cache.put('a', 'x');
      cache.put('b', 'y');

      expect(cache.has('a')).toBe(true);
      expect(cache.has('zzz')).toBe(false);
      expect(cache.keys()).toEqual(['a', 'b']);
      expect(cache.getStats().hits).toBe(0);
      expect(cache.getStats().misses).toBe(0);
    });

    it('should reset entries and hit/miss counters on clear()', () => {
      const cache = new BoundedCache<string>({ capacity: 4 });
      const onClear = jest.fn();
      cache.on('clear', onClear);
      cache.put('a', 'x');
      cache.get('a');
      cache.get('b');

      cache.clear();

      expect(cache.size).toBe(0);
      expect(cache.getStats().hits).toBe(0);
      expect(cache.getStats().misses).toBe(0);
      expect(onClear).toHaveBeenCalledWith({ size: 1 });
    });
  });

  describe('delete', () => {
    it('should be idempotent', () => {
      const cache = new BoundedCache<string>({ capacity: 2 });
      cache.put('a', 'x');

      expect(cache.delete('a')).toBe(true);
      expect(cache.delete('a')).toBe(false);
      expect(cache.size).toBe(0);
    });
  });
});
