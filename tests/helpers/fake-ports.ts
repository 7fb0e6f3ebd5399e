/**
 * In-process stand-ins for the keyword and semantic backends.
 */

import type {
  KeywordMatch,
  KeywordSearchPort,
  PortCallOptions,
  SemanticMatches,
  SemanticSearchPort,
} from '../../src/search/types.js';

export interface EntryMeta {
  category: string;
  level: string;
}

export type Catalog = Record<string, EntryMeta>;

const DEFAULT_META: EntryMeta = { category: 'general', level: 'beginner' };

export interface PortCall {
  query: string;
  limit: number;
  signal?: AbortSignal;
}

/**
 * Behaviour for a query:
 * - a list of titles, best first
 * - 'hang': never settles until the call's signal aborts
 * - 'stall': never settles, ignoring the signal
 * - an Error: rejects with it
 */
export type PortScript = string[] | 'hang' | 'stall' | Error;

abstract class FakePort<R> {
  readonly calls: PortCall[] = [];
  inFlight = 0;
  maxInFlight = 0;
  /** Delay before answering, in ms (real timers) */
  delayMs = 0;

  constructor(
    protected readonly scripts: Record<string, PortScript>,
    protected readonly catalog: Catalog = {}
  ) {}

  get lastSignal(): AbortSignal | undefined {
    return this.calls[this.calls.length - 1]?.signal;
  }

  protected async run(query: string, limit: number, options: PortCallOptions | undefined): Promise<R> {
    this.calls.push({ query, limit, signal: options?.signal });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);

    try {
      const script = this.scripts[query] ?? [];
      if (this.delayMs > 0) {
        await new Promise(resolve => setTimeout(resolve, this.delayMs));
      }
      if (script instanceof Error) {
        throw script;
      }
      if (script === 'hang') {
        return await waitForAbort(options?.signal);
      }
      if (script === 'stall') {
        return await new Promise<never>(() => undefined);
      }
      return this.render(script.slice(0, limit));
    } finally {
      this.inFlight--;
    }
  }

  protected meta(title: string): EntryMeta {
    return this.catalog[title] ?? DEFAULT_META;
  }

  protected abstract render(titles: string[]): R;
}

/**
 * Keyword backend: matchScore falls by 0.1 per position from 1.0.
 */
export class FakeKeywordPort extends FakePort<KeywordMatch[]> implements KeywordSearchPort {
  search(query: string, topK: number, options?: PortCallOptions): Promise<KeywordMatch[]> {
    return this.run(query, topK, options);
  }

  protected render(titles: string[]): KeywordMatch[] {
    return titles.map((title, index) => ({
      title,
      content: `${title} content`,
      ...this.meta(title),
      matchScore: keywordScoreAt(index),
    }));
  }
}

/**
 * Semantic backend: distance grows by 0.1 per position from 0.1.
 */
export class FakeSemanticPort extends FakePort<SemanticMatches> implements SemanticSearchPort {
  search(query: string, nResults: number, options?: PortCallOptions): Promise<SemanticMatches> {
    return this.run(query, nResults, options);
  }

  protected render(titles: string[]): SemanticMatches {
    return {
      ids: titles.map(title => `kb-${title}`),
      metadatas: titles.map(title => ({ title, ...this.meta(title) })),
      distances: titles.map((_, index) => semanticDistanceAt(index)),
    };
  }
}

export function keywordScoreAt(index: number): number {
  return Math.round((1 - index * 0.1) * 10) / 10;
}

export function semanticDistanceAt(index: number): number {
  return Math.round((index + 1) * 0.1 * 10) / 10;
}

function waitForAbort(signal: AbortSignal | undefined): Promise<never> {
  return new Promise<never>((_, reject) => {
    if (!signal) return;
    if (signal.aborted) {
      reject(new Error('aborted'));
      return;
    }
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}
