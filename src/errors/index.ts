export {
  RetrievalError,
  ValidationError,
  ConfigurationError,
  isRetrievalError,
  getErrorMessage,
} from './base-error.js';
export type { RetrievalErrorOptions } from './base-error.js';
export { CacheError } from './cache-error.js';
export {
  KeywordSearchError,
  SemanticSearchError,
  SearchCancelledError,
} from './search-error.js';
export type { PortSearchError } from './search-error.js';
