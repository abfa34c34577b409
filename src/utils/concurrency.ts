/**
 * Runs `worker` over `items` with at most `limit` calls in flight and returns
 * the results in input order. A rejected call rejects the whole map, so
 * callers that need per-item outcomes catch inside the worker.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(items.length, Math.floor(limit) || 1));
  let cursor = 0;

  const lanes = Array.from({ length: width }, async () => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      results[index] = await worker(items[index], index);
    }
  });
  await Promise.all(lanes);
  return results;
}
