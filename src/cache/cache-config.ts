/**
 * Cache Configuration
 *
 * Capacity and default TTL for each cache namespace, with environment
 * overrides:
 *
 *   RETRIEVAL_CACHE_QUERY_CAPACITY / RETRIEVAL_CACHE_QUERY_TTL_MS
 *   RETRIEVAL_CACHE_SEMANTIC_CAPACITY / RETRIEVAL_CACHE_SEMANTIC_TTL_MS
 *   RETRIEVAL_CACHE_KNOWLEDGE_CAPACITY / RETRIEVAL_CACHE_KNOWLEDGE_TTL_MS
 *   RETRIEVAL_CACHE_CLEANUP_INTERVAL_MS
 */

import { z } from 'zod';
import { ConfigurationError } from '../errors/base-error.js';

export const CACHE_NAMESPACES = ['query', 'semantic', 'knowledge'] as const;

export type CacheNamespaceName = (typeof CACHE_NAMESPACES)[number];

export interface CacheNamespaceConfig {
  capacity: number;
  defaultTtlMs: number;
}

export interface CacheManagerConfig {
  namespaces: Record<CacheNamespaceName, CacheNamespaceConfig>;
  /** Periodic prune of expired entries; 0 disables the timer */
  cleanupIntervalMs: number;
}

const HOUR = 60 * 60 * 1000;

export const DEFAULT_CACHE_CONFIG: CacheManagerConfig = {
  namespaces: {
    query: { capacity: 200, defaultTtlMs: HOUR },
    semantic: { capacity: 100, defaultTtlMs: 2 * HOUR },
    knowledge: { capacity: 50, defaultTtlMs: 24 * HOUR },
  },
  cleanupIntervalMs: 0,
};

const NamespaceSchema = z.object({
  capacity: z.number().int().positive(),
  defaultTtlMs: z.number().positive().finite(),
});

export const CacheManagerConfigSchema = z.object({
  namespaces: z.object({
    query: NamespaceSchema,
    semantic: NamespaceSchema,
    knowledge: NamespaceSchema,
  }),
  cleanupIntervalMs: z.number().int().nonnegative(),
});

/**
 * Partial overrides accepted by the CacheManager constructor
 */
export interface CacheConfigOverrides {
  namespaces?: Partial<Record<CacheNamespaceName, Partial<CacheNamespaceConfig>>>;
  cleanupIntervalMs?: number;
}

/**
 * Merge overrides onto a base config and validate the result.
 */
export function resolveCacheConfig(
  overrides: CacheConfigOverrides = {},
  base: CacheManagerConfig = DEFAULT_CACHE_CONFIG
): CacheManagerConfig {
  const merged: CacheManagerConfig = {
    namespaces: {
      query: { ...base.namespaces.query, ...overrides.namespaces?.query },
      semantic: { ...base.namespaces.semantic, ...overrides.namespaces?.semantic },
      knowledge: { ...base.namespaces.knowledge, ...overrides.namespaces?.knowledge },
    },
    cleanupIntervalMs: overrides.cleanupIntervalMs ?? base.cleanupIntervalMs,
  };

  const parsed = CacheManagerConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const setting = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid cache configuration${setting ? ` at ${setting}` : ''}: ${issue?.message ?? 'unknown issue'}`,
      { setting, cause: parsed.error }
    );
  }
  return parsed.data;
}

/**
 * Read a numeric environment variable; empty or missing yields undefined.
 */
export function readNumberEnv(env: NodeJS.ProcessEnv, name: string): number | undefined {
  const raw = env[name];
  if (raw === undefined || raw.trim() === '') return undefined;

  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Environment variable ${name} must be a number, got "${raw}"`, {
      setting: name,
    });
  }
  return value;
}

/**
 * Get environment-aware cache config
 */
export function getCacheConfig(env: NodeJS.ProcessEnv = process.env): CacheManagerConfig {
  const namespaces: Partial<Record<CacheNamespaceName, Partial<CacheNamespaceConfig>>> = {};

  for (const namespace of CACHE_NAMESPACES) {
    const prefix = `RETRIEVAL_CACHE_${namespace.toUpperCase()}`;
    const capacity = readNumberEnv(env, `${prefix}_CAPACITY`);
    const defaultTtlMs = readNumberEnv(env, `${prefix}_TTL_MS`);

    const override: Partial<CacheNamespaceConfig> = {};
    if (capacity !== undefined) override.capacity = capacity;
    if (defaultTtlMs !== undefined) override.defaultTtlMs = defaultTtlMs;
    namespaces[namespace] = override;
  }

  return resolveCacheConfig({
    namespaces,
    cleanupIntervalMs: readNumberEnv(env, 'RETRIEVAL_CACHE_CLEANUP_INTERVAL_MS'),
  });
}
