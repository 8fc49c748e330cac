export type Settled<R> = { ok: true; value: R } | { ok: false; error: unknown };

/**
 * Maps items through an async worker with at most `limit` calls in flight.
 * Results keep the input order regardless of completion order, and a
 * rejected call never stops the others.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> => {
  const results: Settled<R>[] = new Array(items.length);
  const poolSize = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let cursor = 0;

  const runNext = async (): Promise<void> => {
    while (cursor < items.length) {
      const index = cursor;
      cursor += 1;
      try {
        results[index] = { ok: true, value: await worker(items[index], index) };
      } catch (error: unknown) {
        results[index] = { ok: false, error };
      }
    }
  };

  await Promise.all(Array.from({ length: poolSize }, () => runNext()));
  return results;
};
