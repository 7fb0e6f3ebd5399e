import { RetrievalError } from './base-error.js';

/**
 * Cache key derivation or entry write failed.
 *
 * Raised by the cache layer; the search service treats it as a bypass
 * signal and recomputes instead of surfacing it.
 */
export class CacheError extends RetrievalError {
  public readonly namespace?: string;

  constructor(
    message: string,
    options: {
      cause?: unknown;
      namespace?: string;
      context?: Record<string, unknown>;
    } = {}
  ) {
    super('CACHE_ERROR', message, {
      cause: options.cause,
      context: { ...options.context, namespace: options.namespace },
    });
    this.name = 'CacheError';
    this.namespace = options.namespace;
  }
}
