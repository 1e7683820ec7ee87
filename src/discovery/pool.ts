/**
 * VPC Atlas — Bounded Parallelism
 */

/**
 * Process items with at most `concurrency` in flight at once. Results keep
 * the input order. The first rejection rejects the whole pool.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T) => Promise<R>,
  concurrency = 4,
  signal?: AbortSignal,
): Promise<R[]> {
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, async () => {
    while (nextIndex < items.length) {
      if (signal?.aborted) throw new Error("Processing aborted");
      const idx = nextIndex++;
      results[idx] = await processor(items[idx]);
    }
  });

  await Promise.all(workers);
  return results;
}
