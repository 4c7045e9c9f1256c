/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Results keep the order of `items`. The first rejection stops workers from
 * taking new items and is rethrown once the in-flight calls settle.
 */
export const runWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> => {
  let cursor = 0;
  const results = new Array<R>(items.length);
  const errors: unknown[] = [];

  const drain = async (): Promise<void> => {
    while (cursor < items.length) {
      if (errors.length > 0) return;
      const index = cursor++;
      try {
        signal?.throwIfAborted();
        const item = items[index];
        if (item === undefined) continue;
        results[index] = await worker(item, index);
      } catch (error) {
        errors.push(error);
        return;
      }
    }
  };

  const workers = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: workers }, () => drain()));

  if (errors.length > 0) throw errors[0];
  return results;
};
