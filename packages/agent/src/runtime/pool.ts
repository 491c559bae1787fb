export type Settled<T, R> =
  | { item: T; status: 'fulfilled'; value: R }
  | { item: T; status: 'rejected'; reason: unknown };

/**
 * Runs `worker` over `items` with at most `limit` calls in flight and
 * resolves once every call has settled. Results keep input order.
 */
export async function settleAll<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
): Promise<Settled<T, R>[]> {
  if (!(limit >= 1)) {
    throw new RangeError(`Concurrency limit must be at least 1, got ${limit}`);
  }

  const results: Settled<T, R>[] = [];
  const queue = items.entries();

  // Lanes share one iterator, so each item is taken exactly once
  const lane = async (): Promise<void> => {
    for (const [index, item] of queue) {
      try {
        results[index] = { item, status: 'fulfilled', value: await worker(item) };
      } catch (reason: unknown) {
        results[index] = { item, status: 'rejected', reason };
      }
    }
  };

  const lanes = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
