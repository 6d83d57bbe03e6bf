/**
 * Bounded worker pool
 *
 * Starts at most `concurrency` workers that pull items in order until the
 * list is exhausted or `shouldStop` returns true. Items never started are
 * left `undefined` in the returned array. The worker is expected to settle
 * its own errors.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  shouldStop: () => boolean = () => false,
): Promise<Array<R | undefined>> {
  const results: Array<R | undefined> = new Array(items.length).fill(undefined);
  let next = 0;

  async function work(): Promise<void> {
    while (next < items.length && !shouldStop()) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  }

  const size = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: size }, () => work()));

  return results;
}
