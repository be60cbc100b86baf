export interface PoolOptions {
  /** Once aborted, no further item is started */
  signal?: AbortSignal;
}

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight.
 * Items start in index order. After the first failure no new item starts,
 * in-flight calls are awaited, and the failure is rethrown.
 *
 * @returns the number of items that were started
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, idx: number) => Promise<void>,
  options: PoolOptions = {},
): Promise<number> {
  const n = Math.max(1, Math.floor(concurrency));
  let nextIdx = 0;
  let failure: { error: unknown } | undefined;

  async function worker(): Promise<void> {
    for (;;) {
      if (failure || options.signal?.aborted) return;
      const idx = nextIdx;
      if (idx >= items.length) return;
      nextIdx += 1;

      try {
        await fn(items[idx], idx);
      } catch (error) {
        failure ??= { error };
        return;
      }
    }
  }

  const workers = Array.from({ length: Math.min(n, items.length) }, () => worker());
  await Promise.all(workers);
  if (failure) throw failure.error;
  return nextIdx;
}
