/**
 * Fixed-size async worker pool.
 *
 * `size` workers pull items from a shared queue until it is empty. A
 * failed item is recorded and never stops its siblings. The returned
 * promise settles only after every item has finished; there is no
 * cancellation or timeout, so one slow item holds back the whole batch.
 */

export type PoolResult<R> = { ok: true; value: R } | { ok: false; error: unknown };

export async function runPool<T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (completed: number, total: number) => void,
): Promise<Array<PoolResult<R>>> {
  const results: Array<PoolResult<R>> = new Array(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const workerCount = Math.max(1, Math.min(size, queue.length));
  const total = queue.length;
  let completed = 0;

  const workers = Array.from({ length: workerCount }, async () => {
    while (queue.length > 0) {
      const next = queue.shift();
      if (!next) continue;
      try {
        results[next.index] = { ok: true, value: await worker(next.item, next.index) };
      } catch (error) {
        results[next.index] = { ok: false, error };
      } finally {
        completed += 1;
        onSettled?.(completed, total);
      }
    }
  });

  await Promise.all(workers);
  return results;
}
