export interface PoolResult<T, R> {
  item: T;
  status: 'fulfilled' | 'rejected' | 'skipped';
  value?: R;
  reason?: unknown;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight. Results keep
 * input order. Once `signal` aborts, items not yet started are reported as
 * skipped; in-flight work is left to finish.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolResult<T, R>[]> {
  const results: PoolResult<T, R>[] = items.map((item) => ({ item, status: 'skipped' }));
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      const item = items[index];
      try {
        results[index] = { item, status: 'fulfilled', value: await worker(item, index) };
      } catch (reason) {
        results[index] = { item, status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => runLane()));
  return results;
}
