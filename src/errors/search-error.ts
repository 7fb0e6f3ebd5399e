import { RetrievalError } from './base-error.js';

/**
 * Keyword / full-text backend failed
 */
export class KeywordSearchError extends RetrievalError {
  public readonly query: string;

  constructor(query: string, message: string, options: { cause?: unknown } = {}) {
    super('KEYWORD_SEARCH_ERROR', message, { cause: options.cause, context: { query } });
    this.name = 'KeywordSearchError';
    this.query = query;
  }
}

/**
 * Semantic / vector backend failed
 */
export class SemanticSearchError extends RetrievalError {
  public readonly query: string;

  constructor(query: string, message: string, options: { cause?: unknown } = {}) {
    super('SEMANTIC_SEARCH_ERROR', message, { cause: options.cause, context: { query } });
    this.name = 'SemanticSearchError';
    this.query = query;
  }
}

/**
 * The caller aborted the search
 */
export class SearchCancelledError extends RetrievalError {
  public readonly query: string;

  constructor(query: string, options: { cause?: unknown } = {}) {
    super('SEARCH_CANCELLED', `Search cancelled: "${query}"`, {
      cause: options.cause,
      context: { query },
    });
    this.name = 'SearchCancelledError';
    this.query = query;
  }
}

export type PortSearchError = KeywordSearchError | SemanticSearchError;
