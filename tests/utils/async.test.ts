/**
 * Async Helper Tests
 */

import { describe, it, expect } from '@jest/globals';
import { linkAbortSignal, mapWithConcurrency, raceAbort } from '../../src/utils/async.js';

const tick = () => new Promise(resolve => setImmediate(resolve));

describe('linkAbortSignal', () => {
  it('should abort the target with the source reason', () => {
    const source = new AbortController();
    const target = new AbortController();
    linkAbortSignal(source.signal, target);

    source.abort('stop');

    expect(target.signal.aborted).toBe(true);
    expect(target.signal.reason).toBe('stop');
  });

  it('should abort immediately when the source already aborted', () => {
    const source = new AbortController();
    source.abort();
    const target = new AbortController();

    linkAbortSignal(source.signal, target);

    expect(target.signal.aborted).toBe(true);
  });

  it('should stop forwarding once unlinked', () => {
    const source = new AbortController();
    const target = new AbortController();
    const unlink = linkAbortSignal(source.signal, target);

    unlink();
    source.abort();

    expect(target.signal.aborted).toBe(false);
  });

  it('should accept a missing source', () => {
    const target = new AbortController();
    linkAbortSignal(undefined, target)();
    expect(target.signal.aborted).toBe(false);
  });
});

describe('raceAbort', () => {
  it('should resolve with the promise value', async () => {
    const controller = new AbortController();
    await expect(raceAbort(Promise.resolve(7), controller.signal)).resolves.toBe(7);
  });

  it('should reject with the abort reason first', async () => {
    const controller = new AbortController();
    const pending = raceAbort(new Promise<number>(() => undefined), controller.signal);

    controller.abort(new Error('gave up'));

    await expect(pending).rejects.toThrow('gave up');
  });

  it('should reject at once on an aborted signal', async () => {
    const controller = new AbortController();
    controller.abort(new Error('already'));

    await expect(raceAbort(Promise.resolve(1), controller.signal)).rejects.toThrow('already');
  });
});

describe('mapWithConcurrency', () => {
  it('should keep input order', async () => {
    const delays = [15, 1, 5];
    const results = await mapWithConcurrency(delays, 3, async (delay, index) => {
      await new Promise(resolve => setTimeout(resolve, delay));
      return `${index}:${delay}`;
    });

    expect(results).toEqual(['0:15', '1:1', '2:5']);
  });

  it('should bound the number of calls in flight', async () => {
    let inFlight = 0;
    let maxInFlight = 0;

    await mapWithConcurrency([1, 2, 3, 4, 5, 6], 2, async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await tick();
      inFlight--;
    });

    expect(maxInFlight).toBe(2);
  });

  it('should stop taking items after a failure', async () => {
    const started: number[] = [];

    const run = mapWithConcurrency([1, 2, 3, 4], 1, async item => {
      started.push(item);
      if (item === 2) throw new Error('item 2 failed');
      return item;
    });

    await expect(run).rejects.toThrow('item 2 failed');
    expect(started).toEqual([1, 2]);
  });

  it('should return an empty list for no items', async () => {
    await expect(mapWithConcurrency([], 4, async () => 1)).resolves.toEqual([]);
  });
});
