/**
 * Bounded concurrent processing of per-file units.
 */
import os from 'node:os';
import { ErrorCodes, SystemError } from '../../utils/errors.js';

/** Default concurrency for per-file work */
export function defaultConcurrency(): number {
  return Math.max(1, os.availableParallelism());
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new SystemError(ErrorCodes.CANCELLED, 'Operation cancelled');
  }
}

/**
 * Process items in batches with a concurrency limit. Results keep input
 * order. The signal is checked before each batch.
 */
export async function processInBatches<T, R>(
  items: T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
  signal?: AbortSignal
): Promise<R[]> {
  const results: R[] = [];
  const size = Math.max(1, concurrency);
  for (let i = 0; i < items.length; i += size) {
    throwIfAborted(signal);
    const batch = items.slice(i, i + size);
    results.push(...(await Promise.all(batch.map(processor))));
  }
  throwIfAborted(signal);
  return results;
}
