export interface MapWithConcurrencyOptions<T, R> {
  concurrency: number;
  signal?: AbortSignal;
  /** Produces the result for items that never started because the signal aborted. */
  onCancelled: (item: T, index: number) => R;
}

/**
 * Maps `items` through `worker` with at most `concurrency` workers in flight.
 * Results keep input order. Workers own their error handling: a rejection
 * rejects the whole map.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: MapWithConcurrencyOptions<T, R>
): Promise<R[]> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new Error(`Invalid concurrency '${options.concurrency}': expected an integer greater than or equal to 1.`);
  }

  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const runLane = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      const item = items[index];

      if (options.signal?.aborted) {
        results[index] = options.onCancelled(item, index);
        continue;
      }

      results[index] = await worker(item, index);
    }
  };

  const laneCount = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: laneCount }, () => runLane()));
  return results;
}
