/**
 * Bounded async work pool
 */

import { availableParallelism } from 'os';

export interface PoolResult<R> {
  results: R[];
  cancelled: boolean;
}

export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism());
}

/**
 * Run worker over items with at most `limit` in flight
 *
 * The signal is checked before each item starts; items already started run
 * to completion. Results keep item order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
  signal?: AbortSignal
): Promise<PoolResult<R>> {
  const slots: Array<R | undefined> = new Array(items.length);
  const done: boolean[] = new Array(items.length).fill(false);
  let next = 0;
  let cancelled = false;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) {
        cancelled = true;
        return;
      }
      const index = next++;
      slots[index] = await worker(items[index]);
      done[index] = true;
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));

  const results: R[] = [];
  slots.forEach((result, index) => {
    if (done[index] && result !== undefined) {
      results.push(result);
    }
  });

  return { results, cancelled };
}
