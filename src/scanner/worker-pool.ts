/**
 * Bounded worker pool over a fixed item list
 */

export interface PoolOptions<T> {
  /** Upper bound on items in flight */
  concurrency: number;
  /** Checked before each item is taken; once true no further items start */
  shouldStop?: () => boolean;
  /** Receives a worker's failure; without it the failure rejects the pool */
  onError?: (error: unknown, item: T) => Promise<void> | void;
}

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Items already started always run to completion.
 */
export async function runPool<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions<T>
): Promise<void> {
  if (items.length === 0) return;
  const limit = Math.min(Math.max(1, Math.trunc(options.concurrency) || 1), items.length);
  const shouldStop = options.shouldStop ?? (() => false);
  let next = 0;

  const runners = Array.from({ length: limit }, async () => {
    while (next < items.length) {
      if (shouldStop()) return;
      const current = next;
      next += 1;
      const item = items[current];
      try {
        await worker(item, current);
      } catch (error) {
        if (!options.onError) throw error;
        await options.onError(error, item);
      }
    }
  });

  await Promise.all(runners);
}
