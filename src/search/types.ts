/**
 * Hybrid Search Types
 *
 * Types for hybrid search fusing a keyword (full-text) ranking and a
 * semantic (vector) ranking of knowledge entries.
 */

// ============================================================================
// Modes & Sources
// ============================================================================

export const SEARCH_MODES = ['keyword', 'semantic', 'hybrid'] as const;

/**
 * Which backend(s) a search consults
 */
export type SearchMode = (typeof SEARCH_MODES)[number];

/**
 * Backend that produced a hit
 */
export type SearchSource = 'keyword' | 'semantic';

/**
 * What the engine does when one backend fails during a hybrid search
 * - fail: reject the whole search with that backend's error
 * - degrade: rank from the surviving backend and flag the response
 */
export type PartialFailurePolicy = 'fail' | 'degrade';

export function assertNever(value: never): never {
  throw new Error(`Unhandled variant: ${JSON.stringify(value)}`);
}

// ============================================================================
// External Ports
// ============================================================================

export interface PortCallOptions {
  signal?: AbortSignal;
}

/**
 * Row returned by the keyword backend, best match first
 */
export interface KeywordMatch {
  title: string;
  content: string;
  category: string;
  level: string;
  matchScore: number;
}

export interface KeywordSearchPort {
  search(query: string, topK: number, options?: PortCallOptions): Promise<KeywordMatch[]>;
}

export interface SemanticMetadata {
  title: string;
  category: string;
  level: string;
}

/**
 * Column-oriented nearest-neighbour result, nearest first
 */
export interface SemanticMatches {
  ids: string[];
  metadatas: SemanticMetadata[];
  distances: number[];
}

export interface SemanticSearchPort {
  search(query: string, nResults: number, options?: PortCallOptions): Promise<SemanticMatches>;
}

// ============================================================================
// Results
// ============================================================================

/**
 * A single ranked hit from one backend
 */
export interface SearchHit {
  title: string;
  category: string;
  level: string;
  /** Backend score: matchScore for keyword, 1 - distance for semantic */
  score: number;
  /** 1-based position in the backend's list */
  rank: number;
  source: SearchSource;
}

/**
 * A title after merging both rankings
 */
export interface FusedResult {
  title: string;
  category: string;
  level: string;
  keywordScore: number;
  semanticScore: number;
  keywordRank: number | null;
  semanticRank: number | null;
  /** Contributing backends, keyword first */
  sources: SearchSource[];
  combinedScore: number;
}

export interface SourceStats {
  keywordOnly: number;
  semanticOnly: number;
  both: number;
}

export interface SearchTiming {
  total: number;
  cacheLookup?: number;
  keyword?: number;
  semantic?: number;
  fusion?: number;
}

export interface SearchFilters {
  category?: string;
  level?: string;
}

export interface DegradedInfo {
  failedSource: SearchSource;
  reason: string;
}

export interface SearchResponse {
  query: string;
  mode: SearchMode;
  alpha: number;
  results: FusedResult[];
  stats: SourceStats;
  fromCache: boolean;
  timingMs: SearchTiming;
  /** Present on advanced searches */
  filters?: SearchFilters;
  /** Present when a hybrid search ran on one backend only */
  degraded?: DegradedInfo;
}

export interface MultiQueryResponse {
  queries: string[];
  mode: SearchMode;
  alpha: number;
  results: FusedResult[];
  stats: SourceStats;
  timingMs: SearchTiming;
}

// ============================================================================
// Requests
// ============================================================================

export interface SearchRequest {
  query: string;
  topK?: number;
  mode?: SearchMode;
  /** Keyword weight in [0, 1]; semantic weight is 1 - alpha */
  alpha?: number;
  signal?: AbortSignal;
}

export interface AdvancedSearchRequest extends SearchRequest {
  /** Substring that the result category must contain */
  category?: string;
  /** Exact result level */
  level?: string;
}

export interface MultiQuerySearchRequest {
  queries: string[];
  topK?: number;
  mode?: SearchMode;
  alpha?: number;
  signal?: AbortSignal;
}

// ============================================================================
// Configuration
// ============================================================================

export interface SearchConfig {
  defaultTopK: number;
  defaultAlpha: number;
  defaultMode: SearchMode;
  partialFailure: PartialFailurePolicy;
  /** Per-port deadline; 0 disables */
  portTimeoutMs: number;
  /** TTL of responses stored by the cached service */
  resultTtlMs: number;
  /** Parallel searches in a batch */
  batchConcurrency: number;
  /** Candidate multiplier for advanced (filtered) search */
  advancedOversample: number;
}

export const DEFAULT_SEARCH_CONFIG: SearchConfig = {
  defaultTopK: 5,
  defaultAlpha: 0.5,
  defaultMode: 'hybrid',
  partialFailure: 'fail',
  portTimeoutMs: 0,
  resultTtlMs: 30 * 60 * 1000, // 30 minutes
  batchConcurrency: 4,
  advancedOversample: 3,
};
