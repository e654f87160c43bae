export interface PoolOptions {
  /** Checked before each item is taken; once true, workers stop picking up work. */
  isStopped?: () => boolean;
}

/**
 * Process `items` with at most `limit` handlers in flight. Each worker pulls
 * the next unclaimed item, so no item is handled twice. `workerId` lets callers
 * keep per-worker state that is merged after the pool drains.
 */
export async function runWithConcurrency<T, R>(
  items: T[],
  limit: number,
  handler: (item: T, index: number, workerId: number) => Promise<R>,
  options: PoolOptions = {},
): Promise<(R | undefined)[]> {
  if (!items.length) return [];
  const safeLimit = Math.max(1, Math.floor(limit));
  const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
  let nextIndex = 0;
  const workers = Array.from({ length: Math.min(safeLimit, items.length) }, async (_, workerId) => {
    while (true) {
      if (options.isStopped?.()) return;
      const index = nextIndex;
      if (index >= items.length) return;
      nextIndex += 1;
      results[index] = await handler(items[index], index, workerId);
    }
  });
  await Promise.all(workers);
  return results;
}
