/**
 * Bounded worker pool over an indexed list.
 *
 * Results land in an array keyed by submission index, so callers never depend
 * on completion order. Items not started because `shouldStop` turned true are
 * reported as `skipped`.
 */

export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export interface PoolOptions {
  concurrency: number;
  /** Polled before each item is started. */
  shouldStop?: () => boolean;
  /** Called after each item settles, in completion order. */
  onSettled?: (index: number, completed: number) => void;
}

export async function mapPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  opts: PoolOptions,
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = items.map(() => ({ status: 'skipped' }));
  const size = Math.max(1, Math.min(opts.concurrency, items.length));
  let next = 0;
  let completed = 0;

  const run = async (): Promise<void> => {
    while (next < items.length) {
      if (opts.shouldStop?.()) return;
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = { status: 'fulfilled', value: await worker(item, index) };
      } catch (reason) {
        results[index] = { status: 'rejected', reason };
      }
      completed++;
      opts.onSettled?.(index, completed);
    }
  };

  await Promise.all(Array.from({ length: size }, run));
  return results;
}
