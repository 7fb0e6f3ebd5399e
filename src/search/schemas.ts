/**
 * Request validation for the search engine and cached service.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/base-error.js';
import { SEARCH_MODES } from './types.js';
import type { SearchMode } from './types.js';

export const SearchModeSchema = z.enum(SEARCH_MODES);

export const TopKSchema = z.number().int().positive();

export const ConcurrencySchema = z.number().int().positive();

export const AlphaSchema = z.number().min(0).max(1);

export const SearchParamsSchema = z.object({
  query: z.string(),
  topK: TopKSchema,
  mode: SearchModeSchema,
  alpha: AlphaSchema,
});

export type SearchParams = z.infer<typeof SearchParamsSchema>;

/**
 * Parse a free-form mode string (CLI flag, env var, query param).
 */
export function parseSearchMode(value: string): SearchMode {
  const parsed = SearchModeSchema.safeParse(value.trim().toLowerCase());
  if (!parsed.success) {
    throw new ValidationError(`Unknown search mode "${value}"`, [
      `mode must be one of ${SEARCH_MODES.join(', ')}`,
    ]);
  }
  return parsed.data;
}

/**
 * Validate resolved search parameters, raising ValidationError with one
 * line per failed field.
 */
export function validateSearchParams(params: SearchParams): SearchParams {
  const parsed = SearchParamsSchema.safeParse(params);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ValidationError(`Invalid search request: ${issues.join('; ')}`, issues, {
      context: { query: params.query },
    });
  }
  return parsed.data;
}

export function validateConcurrency(concurrency: number): number {
  const parsed = ConcurrencySchema.safeParse(concurrency);
  if (!parsed.success) {
    throw new ValidationError(`Invalid batch concurrency: ${concurrency}`, [
      'concurrency must be a positive integer',
    ]);
  }
  return parsed.data;
}
