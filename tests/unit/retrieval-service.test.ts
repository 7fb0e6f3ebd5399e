/**
 * Composition Root Tests
 */

import { jest, describe, afterEach, it, expect } from '@jest/globals';

// Mock logger to prevent console output during tests
jest.mock('../../src/utils/logger.js', () => ({
  logger: {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
  },
}));

import { createRetrievalService } from '../../src/index.js';
import type { RetrievalService } from '../../src/index.js';
import { FakeKeywordPort, FakeSemanticPort } from '../helpers/fake-ports.js';

describe('createRetrievalService', () => {
  const created: RetrievalService[] = [];

  function create(...args: Parameters<typeof createRetrievalService>): RetrievalService {
    const retrieval = createRetrievalService(...args);
    created.push(retrieval);
    return retrieval;
  }

  afterEach(() => {
    for (const retrieval of created.splice(0)) {
      retrieval.dispose();
    }
  });

  it('should wire a working cached search', async () => {
    const { service } = create({
      keywordPort: new FakeKeywordPort({ graphs: ['BFS', 'DFS'] }),
      semanticPort: new FakeSemanticPort({ graphs: ['DFS', 'Dijkstra'] }),
      env: {},
    });

    const first = await service.search({ query: 'graphs', topK: 3 });
    const second = await service.search({ query: 'graphs', topK: 3 });

    expect(first.results.map(r => r.title)).toEqual(['DFS', 'BFS', 'Dijkstra']);
    expect(second.fromCache).toBe(true);
  });

  it('should apply environment settings and explicit overrides', () => {
    const { cacheManager, engine } = create({
      keywordPort: new FakeKeywordPort({}),
      semanticPort: new FakeSemanticPort({}),
      env: {
        RETRIEVAL_CACHE_QUERY_CAPACITY: '7',
        RETRIEVAL_SEARCH_ALPHA: '0.9',
        RETRIEVAL_SEARCH_TOP_K: '3',
      },
      cache: { namespaces: { knowledge: { capacity: 9 } } },
      search: { defaultTopK: 4 },
    });

    expect(cacheManager.getConfig().namespaces.query.capacity).toBe(7);
    expect(cacheManager.getConfig().namespaces.knowledge.capacity).toBe(9);
    expect(engine.getConfig().defaultAlpha).toBe(0.9);
    expect(engine.getConfig().defaultTopK).toBe(4);
  });

  it('should return independent instances', async () => {
    const ports = {
      keywordPort: new FakeKeywordPort({ graphs: ['BFS'] }),
      semanticPort: new FakeSemanticPort({ graphs: [] }),
      env: {},
    };
    const a = create(ports);
    const b = create(ports);

    await a.service.search({ query: 'graphs' });

    expect(a.cacheManager.getStats().totalSize).toBe(1);
    expect(b.cacheManager.getStats().totalSize).toBe(0);
  });
});
