/**
 * Search Configuration
 *
 * Environment overrides for DEFAULT_SEARCH_CONFIG:
 *
 *   RETRIEVAL_SEARCH_TOP_K, RETRIEVAL_SEARCH_ALPHA, RETRIEVAL_SEARCH_MODE,
 *   RETRIEVAL_SEARCH_PARTIAL_FAILURE (fail | degrade),
 *   RETRIEVAL_SEARCH_RESULT_TTL_MS, RETRIEVAL_SEARCH_PORT_TIMEOUT_MS,
 *   RETRIEVAL_BATCH_CONCURRENCY
 */

import { z } from 'zod';
import { ConfigurationError, ValidationError } from '../errors/base-error.js';
import { readNumberEnv } from '../cache/cache-config.js';
import { AlphaSchema, ConcurrencySchema, SearchModeSchema, TopKSchema, parseSearchMode } from './schemas.js';
import { DEFAULT_SEARCH_CONFIG } from './types.js';
import type { SearchConfig } from './types.js';

export const SearchConfigSchema = z.object({
  defaultTopK: TopKSchema,
  defaultAlpha: AlphaSchema,
  defaultMode: SearchModeSchema,
  partialFailure: z.enum(['fail', 'degrade']),
  portTimeoutMs: z.number().int().nonnegative(),
  resultTtlMs: z.number().positive().finite(),
  batchConcurrency: ConcurrencySchema,
  advancedOversample: z.number().int().positive(),
});

export function resolveSearchConfig(
  overrides: Partial<SearchConfig> = {},
  base: SearchConfig = DEFAULT_SEARCH_CONFIG
): SearchConfig {
  const parsed = SearchConfigSchema.safeParse({ ...base, ...overrides });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const setting = issue ? issue.path.join('.') : undefined;
    throw new ConfigurationError(
      `Invalid search configuration${setting ? ` at ${setting}` : ''}: ${issue?.message ?? 'unknown issue'}`,
      { setting, cause: parsed.error }
    );
  }
  return parsed.data;
}

export function getSearchConfig(env: NodeJS.ProcessEnv = process.env): SearchConfig {
  const overrides: Partial<SearchConfig> = {};

  const topK = readNumberEnv(env, 'RETRIEVAL_SEARCH_TOP_K');
  if (topK !== undefined) overrides.defaultTopK = topK;

  const alpha = readNumberEnv(env, 'RETRIEVAL_SEARCH_ALPHA');
  if (alpha !== undefined) overrides.defaultAlpha = alpha;

  const mode = env.RETRIEVAL_SEARCH_MODE;
  if (mode) {
    try {
      overrides.defaultMode = parseSearchMode(mode);
    } catch (error) {
      if (error instanceof ValidationError) {
        throw new ConfigurationError(error.message, { setting: 'RETRIEVAL_SEARCH_MODE', cause: error });
      }
      throw error;
    }
  }

  const partialFailure = env.RETRIEVAL_SEARCH_PARTIAL_FAILURE;
  if (partialFailure === 'fail' || partialFailure === 'degrade') {
    overrides.partialFailure = partialFailure;
  } else if (partialFailure) {
    throw new ConfigurationError(
      `RETRIEVAL_SEARCH_PARTIAL_FAILURE must be "fail" or "degrade", got "${partialFailure}"`,
      { setting: 'RETRIEVAL_SEARCH_PARTIAL_FAILURE' }
    );
  }

  const resultTtlMs = readNumberEnv(env, 'RETRIEVAL_SEARCH_RESULT_TTL_MS');
  if (resultTtlMs !== undefined) overrides.resultTtlMs = resultTtlMs;

  const portTimeoutMs = readNumberEnv(env, 'RETRIEVAL_SEARCH_PORT_TIMEOUT_MS');
  if (portTimeoutMs !== undefined) overrides.portTimeoutMs = portTimeoutMs;

  const batchConcurrency = readNumberEnv(env, 'RETRIEVAL_BATCH_CONCURRENCY');
  if (batchConcurrency !== undefined) overrides.batchConcurrency = batchConcurrency;

  return resolveSearchConfig(overrides);
}
