export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight.
 * Once `signal` aborts no further item is started; items already running
 * finish. Returns the indexes that were never started.
 */
export async function runPool<T>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions
): Promise<number[]> {
  if (!Number.isInteger(options.concurrency) || options.concurrency <= 0) {
    throw new RangeError('concurrency must be a positive integer.');
  }

  let nextIndex = 0;
  const notStarted: number[] = [];

  async function lane(): Promise<void> {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;

      if (options.signal?.aborted) {
        notStarted.push(index);
        continue;
      }

      await worker(items[index], index);
    }
  }

  const laneCount = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => lane()));

  return notStarted.sort((a, b) => a - b);
}
