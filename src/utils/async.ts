/**
 * Promise helpers: abort linking and bounded parallel mapping.
 */

/**
 * Abort `target` when `source` aborts. Returns a function that removes the
 * link; an already aborted source aborts the target immediately.
 */
export function linkAbortSignal(source: AbortSignal | undefined, target: AbortController): () => void {
  if (!source) return () => undefined;

  if (source.aborted) {
    target.abort(source.reason);
    return () => undefined;
  }

  const onAbort = (): void => target.abort(source.reason);
  source.addEventListener('abort', onAbort, { once: true });
  return () => source.removeEventListener('abort', onAbort);
}

/**
 * Settle with `promise` unless `signal` aborts first, in which case reject
 * with the abort reason. The promise's own rejection is always observed.
 */
export function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(signal.reason);

    if (signal.aborted) {
      onAbort();
    } else {
      signal.addEventListener('abort', onAbort, { once: true });
    }

    promise.then(
      value => {
        signal.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        signal.removeEventListener('abort', onAbort);
        reject(error);
      }
    );
  });
}

/**
 * Map `items` through `fn` with at most `concurrency` calls in flight.
 * Results keep input order. The first rejection rejects the whole map and
 * stops workers from picking up further items.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  let aborted = false;

  const worker = async (): Promise<void> => {
    while (queue.length > 0 && !aborted) {
      const task = queue.shift();
      if (!task) break;
      try {
        results[task.index] = await fn(task.item, task.index);
      } catch (error) {
        aborted = true;
        throw error;
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, items.length); i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
  return results;
}
