/**
 * Cache Key Derivation Tests
 */

import { describe, it, expect } from '@jest/globals';
import { deriveCacheKey, encodeKeyPart, encodeKeyTuple } from '../../src/cache/cache-key.js';
import { CacheError } from '../../src/errors/cache-error.js';

describe('encodeKeyPart', () => {
  it('should tag scalars by type', () => {
    expect(encodeKeyPart('hello')).toBe('s:"hello"');
    expect(encodeKeyPart(5)).toBe('n:5');
    expect(encodeKeyPart(0.5)).toBe('n:0.5');
    expect(encodeKeyPart(true)).toBe('b:true');
    expect(encodeKeyPart(null)).toBe('z');
  });

  it('should keep look-alike values apart', () => {
    expect(encodeKeyPart('5')).not.toBe(encodeKeyPart(5));
    expect(encodeKeyPart('true')).not.toBe(encodeKeyPart(true));
    expect(encodeKeyPart('null')).not.toBe(encodeKeyPart(null));
  });

  it('should normalize negative zero', () => {
    expect(encodeKeyPart(-0)).toBe('n:0');
  });

  it('should encode arrays in order', () => {
    expect(encodeKeyPart([1, 'x'])).toBe('a[n:1,s:"x"]');
    expect(encodeKeyPart([1, 'x'])).not.toBe(encodeKeyPart(['x', 1]));
  });

  it('should sort object keys and skip undefined members', () => {
    expect(encodeKeyPart({ b: 1, a: 2 })).toBe('o{"a":n:2,"b":n:1}');
    expect(encodeKeyPart({ a: 2, b: 1 })).toBe(encodeKeyPart({ b: 1, a: 2 }));
    expect(encodeKeyPart({ a: 1, b: undefined })).toBe('o{"a":n:1}');
  });

  it('should accept the same object twice when it is not circular', () => {
    const shared = { k: 'v' };
    expect(encodeKeyPart([shared, shared])).toBe('a[o{"k":s:"v"},o{"k":s:"v"}]');
  });

  it.each([
    ['NaN', Number.NaN],
    ['Infinity', Number.POSITIVE_INFINITY],
    ['undefined', undefined],
    ['a function', () => 1],
    ['a symbol', Symbol('s')],
    ['a bigint', BigInt(1)],
    ['a Date', new Date(0)],
  ])('should reject %s', (_label, value) => {
    expect(() => encodeKeyPart(value)).toThrow(CacheError);
  });

  it('should reject circular structures', () => {
    const node: Record<string, unknown> = { name: 'loop' };
    node.self = node;
    expect(() => encodeKeyPart(node)).toThrow('circular');
  });
});

describe('deriveCacheKey', () => {
  it('should prefix a SHA-256 hex digest with the namespace', () => {
    expect(deriveCacheKey('query', ['q', 'hybrid', 5])).toMatch(/^query:[0-9a-f]{64}$/);
  });

  it('should be deterministic for equal tuples', () => {
    expect(deriveCacheKey('query', ['q', 'hybrid', 5, 0.5])).toBe(deriveCacheKey('query', ['q', 'hybrid', 5, 0.5]));
  });

  it('should depend on argument order', () => {
    expect(deriveCacheKey('query', ['a', 'b'])).not.toBe(deriveCacheKey('query', ['b', 'a']));
  });

  it('should depend on the namespace', () => {
    expect(deriveCacheKey('query', ['x'])).not.toBe(deriveCacheKey('semantic', ['x']));
  });

  it('should not confuse argument boundaries', () => {
    expect(deriveCacheKey('query', ['a|b'])).not.toBe(deriveCacheKey('query', ['a', 'b']));
  });
});

describe('encodeKeyTuple', () => {
  it('should join the namespace and encoded arguments', () => {
    expect(encodeKeyTuple('query', ['hello', 5, true, null])).toBe('ns:"query"|s:"hello"|n:5|b:true|z');
  });
});
