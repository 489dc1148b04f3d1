/**
 * Run `worker` over `items` with at most `limit` calls in flight. Results keep
 * the order of `items` whatever order the calls finish in. Once the signal
 * aborts no further items are started and the returned promise rejects.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  const results = new Array<R>(items.length);
  let next = 0;

  const drain = async (): Promise<void> => {
    while (next < items.length) {
      signal?.throwIfAborted();
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  // Lanes still awaiting a worker after an abort are not waited for; workers must honour the signal themselves
  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => drain());
  await Promise.all(lanes);
  return results;
}
