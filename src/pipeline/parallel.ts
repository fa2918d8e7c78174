/**
 * Ordered worker pool
 */

export type Settled<R> = { success: true; value: R } | { success: false; error: unknown };

/**
 * Run `processor` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`; a rejected call is captured in its slot
 * and does not stop the others.
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  concurrency: number
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(items.length);
  // Workers share one iterator, so each item is taken exactly once
  const queue = items.entries();

  async function worker(): Promise<void> {
    for (const [index, item] of queue) {
      try {
        const value = await processor(item, index);
        results[index] = { success: true, value };
      } catch (error) {
        results[index] = { success: false, error };
      }
    }
  }

  const workers = Array(Math.max(1, Math.min(concurrency, items.length)))
    .fill(null)
    .map(() => worker());

  await Promise.all(workers);
  return results;
}
