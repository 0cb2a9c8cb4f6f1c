/**
 * Tests for concurrency helpers
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { batchProcess, sleep } from '../src/utils/concurrency.js';

describe('batchProcess', () => {
  it('should keep input order with bounded parallelism', async () => {
    let active = 0;
    let peak = 0;

    const results = await batchProcess(
      [5, 1, 3, 2],
      async (n) => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, n));
        active--;
        return n * 10;
      },
      2
    );

    expect(results).toEqual([50, 10, 30, 20]);
    expect(peak).toBe(2);
  });
});

describe('sleep', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should resolve after the delay', async () => {
    vi.useFakeTimers();
    let done = false;
    const sleeping = sleep(100).then(() => {
      done = true;
    });

    await vi.advanceTimersByTimeAsync(99);
    expect(done).toBe(false);
    await vi.advanceTimersByTimeAsync(1);
    await sleeping;
    expect(done).toBe(true);
  });

  it('should resolve early when aborted', async () => {
    vi.useFakeTimers();
    const controller = new AbortController();
    const sleeping = sleep(60000, controller.signal);

    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
    expect(vi.getTimerCount()).toBe(0);
  });
});
