/**
 * Concurrency control utilities
 */

import pLimit from 'p-limit';

/**
 * Batch process items with concurrency control
 * @param items Array of items to process
 * @param processor Function to process each item
 * @param concurrency Maximum concurrent tasks
 * @returns Array of results, in input order
 */
export async function batchProcess<T, R>(
  items: readonly T[],
  processor: (item: T) => Promise<R>,
  concurrency = 10
): Promise<R[]> {
  const limit = pLimit(concurrency);
  const tasks = items.map((item) => limit(() => processor(item)));
  return await Promise.all(tasks);
}

/**
 * Sleep for specified milliseconds. Resolves early when the signal aborts.
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0 || signal?.aborted) {
    return Promise.resolve();
  }

  return new Promise((resolve) => {
    const onAbort = () => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
