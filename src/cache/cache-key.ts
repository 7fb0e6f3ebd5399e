/**
 * Cache Key Derivation
 *
 * Turns an ordered tuple of call arguments into a stable cache key.
 *
 * Each argument is encoded with a type tag so that values which print the
 * same never collide (`"5"` vs `5`, `"true"` vs `true`, `null` vs `"null"`):
 *
 *   s:"text"   string (JSON-quoted)
 *   n:0.5      finite number
 *   b:true     boolean
 *   z          null
 *   a[...]     array, elements in order
 *   o{...}     plain object, keys sorted, undefined members skipped
 *
 * The encoded tuple is prefixed with the namespace and hashed with SHA-256.
 * Argument order is significant; object key order is not.
 */

import * as crypto from 'crypto';
import { CacheError } from '../errors/cache-error.js';

export type KeyPart =
  | string
  | number
  | boolean
  | null
  | readonly KeyPart[]
  | { readonly [field: string]: KeyPart | undefined };

/**
 * Encode a single argument. Throws CacheError for values with no stable
 * representation (undefined, functions, symbols, bigint, NaN/Infinity,
 * circular structures).
 */
export function encodeKeyPart(value: unknown, ancestors: Set<object> = new Set()): string {
  if (value === null) return 'z';

  switch (typeof value) {
    case 'string':
      return `s:${JSON.stringify(value)}`;
    case 'number':
      if (!Number.isFinite(value)) {
        throw new CacheError(`Cannot derive cache key from non-finite number ${String(value)}`);
      }
      // Normalize -0 so that 0 and -0 share a key
      return `n:${Object.is(value, -0) ? 0 : value}`;
    case 'boolean':
      return `b:${value}`;
    case 'object':
      return encodeComposite(value, ancestors);
    default:
      throw new CacheError(`Cannot derive cache key from value of type ${typeof value}`);
  }
}

function encodeComposite(value: object, ancestors: Set<object>): string {
  if (ancestors.has(value)) {
    throw new CacheError('Cannot derive cache key from circular structure');
  }
  ancestors.add(value);

  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return `a[${items.map(item => encodeKeyPart(item, ancestors)).join(',')}]`;
    }

    const proto: unknown = Object.getPrototypeOf(value);
    if (proto !== Object.prototype && proto !== null) {
      throw new CacheError(
        `Cannot derive cache key from ${value.constructor?.name ?? 'unknown'} instance`
      );
    }

    const fields: string[] = [];
    for (const [field, member] of Object.entries(value).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))) {
      if (member === undefined) continue;
      fields.push(`${JSON.stringify(field)}:${encodeKeyPart(member, ancestors)}`);
    }
    return `o{${fields.join(',')}}`;
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Encode an argument tuple without hashing (useful for debugging keys).
 */
export function encodeKeyTuple(namespace: string, args: readonly KeyPart[]): string {
  return [`ns:${JSON.stringify(namespace)}`, ...args.map(arg => encodeKeyPart(arg))].join('|');
}

/**
 * Derive `<namespace>:<sha256 hex>` from an argument tuple.
 */
export function deriveCacheKey(namespace: string, args: readonly KeyPart[]): string {
  const encoded = encodeKeyTuple(namespace, args);
  const digest = crypto.createHash('sha256').update(encoded).digest('hex');
  return `${namespace}:${digest}`;
}
