/**
 * Bounded Worker Pool
 *
 * Runs an async worker over a list of items with at most `limit` workers in
 * flight. Every item yields a settled result; a rejected worker never stops
 * the others. Items not yet started when the signal aborts are reported as
 * `skipped` and their worker is never called.
 */

export type PoolResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal
): Promise<PoolResult<R>[]> {
  const results: PoolResult<R>[] = items.map((): PoolResult<R> => ({ status: 'skipped' }));
  let next = 0;

  async function lane(): Promise<void> {
    while (next < items.length) {
      if (signal?.aborted) return;
      const index = next++;
      try {
        results[index] = { status: 'fulfilled', value: await worker(items[index], index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
    }
  }

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return results;
}
