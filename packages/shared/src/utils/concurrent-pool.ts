/**
 * ConcurrentPool - Worker pool with a fixed number of in-flight tasks.
 *
 * Unlike batch processing, a worker that finishes immediately takes the next
 * queued item, so exactly `concurrency` tasks are running until the queue
 * drains. This is the backpressure used for translation requests and image
 * classification.
 */
export class ConcurrentPool {
  /**
   * Process items with at most `concurrency` tasks in flight.
   *
   * Results keep the input order. When `signal` is aborted, workers stop
   * taking new items and the run rejects with an AbortError once the
   * in-flight tasks settle.
   *
   * @param items - Items to process
   * @param concurrency - Maximum number of in-flight tasks (values below 1 count as 1)
   * @param processFn - Async function applied to each item
   * @param onItemComplete - Optional callback fired after each item completes
   * @param signal - Optional abort signal
   */
  static async run<T, R>(
    items: readonly T[],
    concurrency: number,
    processFn: (item: T, index: number) => Promise<R>,
    onItemComplete?: (result: R, index: number) => void,
    signal?: AbortSignal,
  ): Promise<R[]> {
    const results: R[] = new Array(items.length);
    let nextIndex = 0;

    async function worker(): Promise<void> {
      while (nextIndex < items.length && !signal?.aborted) {
        const index = nextIndex++;
        const result = await processFn(items[index], index);
        results[index] = result;
        onItemComplete?.(result, index);
      }
    }

    const workerCount = Math.min(Math.max(1, concurrency), items.length);
    await Promise.all(Array.from({ length: workerCount }, () => worker()));

    if (signal?.aborted && nextIndex < items.length) {
      const error = new Error('Concurrent processing was aborted');
      error.name = 'AbortError';
      throw error;
    }

    return results;
  }
}
