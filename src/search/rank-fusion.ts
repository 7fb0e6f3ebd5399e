/**
 * Rank Fusion
 *
 * Pure functions turning backend rows into ranked hits and merging the two
 * rankings. Scores are rank-normalized (1 / (rank + 1)) so that keyword match
 * scores and vector distances never need a common scale.
 */

import type {
  FusedResult,
  KeywordMatch,
  SearchFilters,
  SearchHit,
  SearchSource,
  SemanticMatches,
  SourceStats,
} from './types.js';

// ============================================================================
// Backend rows -> hits
// ============================================================================

/**
 * Keyword rows to hits. Rank is the 1-based row position; a title seen
 * again further down the list is dropped.
 */
export function toKeywordHits(matches: readonly KeywordMatch[]): SearchHit[] {
  const seen = new Set<string>();
  const hits: SearchHit[] = [];

  matches.forEach((match, index) => {
    if (seen.has(match.title)) return;
    seen.add(match.title);
    hits.push({
      title: match.title,
      category: match.category,
      level: match.level,
      score: match.matchScore,
      rank: index + 1,
      source: 'keyword',
    });
  });

  return hits;
}

/**
 * Column-oriented semantic matches to hits, score = 1 - distance.
 * Columns of unequal length are read up to the shortest one.
 */
export function toSemanticHits(matches: SemanticMatches): SearchHit[] {
  const length = Math.min(matches.ids.length, matches.metadatas.length, matches.distances.length);
  const seen = new Set<string>();
  const hits: SearchHit[] = [];

  for (let index = 0; index < length; index++) {
    const metadata = matches.metadatas[index];
    const distance = matches.distances[index];
    if (metadata === undefined || distance === undefined || seen.has(metadata.title)) continue;
    seen.add(metadata.title);

    hits.push({
      title: metadata.title,
      category: metadata.category,
      level: metadata.level,
      score: 1 - distance,
      rank: index + 1,
      source: 'semantic',
    });
  }

  return hits;
}

// ============================================================================
// Fusion
// ============================================================================

export function normalizedRankScore(rank: number): number {
  return 1 / (rank + 1);
}

/**
 * Results of a single-backend search: combinedScore is the backend score and
 * the backend's order is kept.
 */
export function toSingleSourceResults(hits: readonly SearchHit[]): FusedResult[] {
  return hits.map(hit => ({
    title: hit.title,
    category: hit.category,
    level: hit.level,
    keywordScore: hit.source === 'keyword' ? hit.score : 0,
    semanticScore: hit.source === 'semantic' ? hit.score : 0,
    keywordRank: hit.source === 'keyword' ? hit.rank : null,
    semanticRank: hit.source === 'semantic' ? hit.rank : null,
    sources: [hit.source],
    combinedScore: hit.score,
  }));
}

/**
 * Weighted rank fusion. alpha weights the keyword ranking, 1 - alpha the
 * semantic one; titles found by both are merged. The sort is stable, so
 * equal scores keep keyword-then-semantic insertion order.
 */
export function fuseRankings(
  keywordHits: readonly SearchHit[],
  semanticHits: readonly SearchHit[],
  alpha: number
): FusedResult[] {
  const merged = new Map<string, FusedResult>();

  for (const hit of keywordHits) {
    merged.set(hit.title, {
      title: hit.title,
      category: hit.category,
      level: hit.level,
      keywordScore: hit.score,
      semanticScore: 0,
      keywordRank: hit.rank,
      semanticRank: null,
      sources: ['keyword'],
      combinedScore: alpha * normalizedRankScore(hit.rank),
    });
  }

  for (const hit of semanticHits) {
    const contribution = (1 - alpha) * normalizedRankScore(hit.rank);
    const existing = merged.get(hit.title);

    if (existing) {
      existing.semanticScore = hit.score;
      existing.semanticRank = hit.rank;
      existing.sources.push('semantic');
      existing.combinedScore += contribution;
    } else {
      merged.set(hit.title, {
        title: hit.title,
        category: hit.category,
        level: hit.level,
        keywordScore: 0,
        semanticScore: hit.score,
        keywordRank: null,
        semanticRank: hit.rank,
        sources: ['semantic'],
        combinedScore: contribution,
      });
    }
  }

  return sortByCombinedScore(Array.from(merged.values()));
}

export function sortByCombinedScore(results: FusedResult[]): FusedResult[] {
  return results.sort((a, b) => b.combinedScore - a.combinedScore);
}

// ============================================================================
// Post-processing
// ============================================================================

export function computeSourceStats(results: readonly FusedResult[]): SourceStats {
  const stats: SourceStats = { keywordOnly: 0, semanticOnly: 0, both: 0 };

  for (const result of results) {
    if (hasSource(result, 'keyword') && hasSource(result, 'semantic')) {
      stats.both++;
    } else if (hasSource(result, 'keyword')) {
      stats.keywordOnly++;
    } else if (hasSource(result, 'semantic')) {
      stats.semanticOnly++;
    }
  }

  return stats;
}

function hasSource(result: FusedResult, source: SearchSource): boolean {
  return result.sources.includes(source);
}

/**
 * Keep results whose category contains `filters.category` and whose level
 * equals `filters.level`, stopping at `limit`.
 */
export function filterResults(
  results: readonly FusedResult[],
  filters: SearchFilters,
  limit: number
): FusedResult[] {
  const kept: FusedResult[] = [];

  for (const result of results) {
    if (kept.length >= limit) break;
    if (filters.category && !result.category.includes(filters.category)) continue;
    if (filters.level && result.level !== filters.level) continue;
    kept.push(result);
  }

  return kept;
}

/**
 * Merge result lists by title, keeping the entry with the highest
 * combinedScore (the first one seen on a tie), then sort.
 */
export function mergeByTitle(resultLists: readonly (readonly FusedResult[])[]): FusedResult[] {
  const best = new Map<string, FusedResult>();

  for (const results of resultLists) {
    for (const result of results) {
      const current = best.get(result.title);
      if (!current || result.combinedScore > current.combinedScore) {
        best.set(result.title, result);
      }
    }
  }

  return sortByCombinedScore(Array.from(best.values()));
}
