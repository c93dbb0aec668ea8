// engine/sync/pool.ts — Bounded async worker pool

export interface PoolOptions<T, R> {
  /** Upper bound on tasks in flight; clamped to [1, items.length]. */
  concurrency: number;
  run: (item: T) => Promise<R>;
  /** Turns a task's rejection into a result so one task cannot sink the batch. */
  recover: (item: T, err: unknown) => R;
}

/**
 * Run `run` over every item with at most `concurrency` in flight.
 * Results come back in input order.
 */
export async function runPool<T, R>(items: readonly T[], options: PoolOptions<T, R>): Promise<R[]> {
  const results = new Array<R>(items.length);
  const workers = Math.max(1, Math.min(options.concurrency, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      try {
        results[index] = await options.run(item);
      } catch (err) {
        results[index] = options.recover(item, err);
      }
    }
  };

  await Promise.all(Array.from({ length: workers }, worker));
  return results;
}
