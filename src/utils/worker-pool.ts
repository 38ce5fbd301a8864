/**
 * Bounded worker pool over a fixed list of items.
 *
 * Starts `min(concurrency, items.length)` workers; each pulls the next unclaimed index until
 * the list is exhausted. Results keep input order, so output never depends on the pool size.
 * Resolves once every worker has finished (join barrier); rejects with the first error thrown
 * by `work`.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  work: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const size = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await work(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: size }, () => worker()));
  return results;
}
