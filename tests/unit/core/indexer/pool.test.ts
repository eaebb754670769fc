/**
 * Tests for bounded batch processing.
 */
import { describe, it, expect } from 'vitest';
import { processInBatches, defaultConcurrency } from '../../../../src/core/indexer/pool.js';
import { ErrorCodes, SystemError } from '../../../../src/utils/errors.js';

describe('processInBatches', () => {
  it('should keep input order', async () => {
    const results = await processInBatches([5, 1, 4, 2, 3], 2, async (n) => {
      await new Promise((resolve) => setTimeout(resolve, n));
      return n * 10;
    });

    expect(results).toEqual([50, 10, 40, 20, 30]);
  });

  it('should not exceed the concurrency limit', async () => {
    let active = 0;
    let peak = 0;
    await processInBatches([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await new Promise((resolve) => setTimeout(resolve, 1));
      active--;
    });

    expect(peak).toBe(3);
  });

  it('should stop when the signal is aborted', async () => {
    const controller = new AbortController();
    const seen: number[] = [];
    const run = processInBatches(
      [1, 2, 3, 4],
      2,
      async (n) => {
        seen.push(n);
        if (n === 2) controller.abort();
        return n;
      },
      controller.signal
    );

    await expect(run).rejects.toBeInstanceOf(SystemError);
    await expect(run).rejects.toMatchObject({ code: ErrorCodes.CANCELLED });
    expect(seen).toEqual([1, 2]);
  });

  it('should handle an empty input', async () => {
    expect(await processInBatches([], 4, async (n: number) => n)).toEqual([]);
  });
});

describe('defaultConcurrency', () => {
  it('should be at least one', () => {
    expect(defaultConcurrency()).toBeGreaterThanOrEqual(1);
  });
});
