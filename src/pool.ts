/**
 * Bounded-concurrency worker pool
 */

/** Options for {@link runPool} */
export interface PoolOptions<R> {
  /** Number of lanes pulling items concurrently (clamped to at least 1) */
  workers: number;
  /** Polled before a lane takes the next item; true stops new work */
  shouldStop?: () => boolean;
  /** Called as each item finishes, in completion order */
  onResult?: (result: R, index: number) => void;
}

/** Result of a pool run; entries for items never started stay undefined */
export interface PoolOutcome<R> {
  results: (R | undefined)[];
  /** True if shouldStop ended the run before every item started */
  stopped: boolean;
}

/**
 * Run `worker` over `items` with at most `workers` calls in flight.
 * Items are taken in order; completion order is not guaranteed.
 * A worker that throws rejects the whole run, so workers are expected to
 * report failures in their result instead.
 *
 * Every started item is awaited before the returned promise settles.
 */
export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions<R>,
): Promise<PoolOutcome<R>> {
  const results: (R | undefined)[] = new Array<R | undefined>(items.length).fill(undefined);
  const lanes = Math.max(1, Math.min(options.workers, items.length));
  let next = 0;
  let stopped = false;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (options.shouldStop?.()) {
        stopped = true;
        return;
      }
      const index = next++;
      const result = await worker(items[index], index);
      results[index] = result;
      options.onResult?.(result, index);
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return { results, stopped };
}
