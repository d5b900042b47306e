/**
 * Concurrency control utilities
 */

import pLimit from 'p-limit';

/**
 * Run a worker over every item with at most `concurrency` in flight.
 *
 * Once `signal` is aborted no further item is started; results of items that
 * already finished are returned, in input order.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  worker: (item: T) => Promise<R>,
  concurrency = 1,
  signal?: AbortSignal
): Promise<R[]> {
  const limit = pLimit(Math.max(1, concurrency));
  const tasks = items.map((item) =>
    limit(async (): Promise<{ done: true; value: R } | { done: false }> => {
      if (signal?.aborted) return { done: false };
      return { done: true, value: await worker(item) };
    })
  );

  const settled = await Promise.all(tasks);
  const results: R[] = [];
  for (const entry of settled) {
    if (entry.done) results.push(entry.value);
  }
  return results;
}

/**
 * Sleep for specified milliseconds
 * @param ms Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
