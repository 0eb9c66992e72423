import { describe, expect, it } from 'vitest';
import { runWithConcurrency, sleep } from '@/utils/concurrency';

describe('runWithConcurrency', () => {
  it('keeps input order when tasks finish out of order', async () => {
    const delays = [30, 5, 20, 1];

    const results = await runWithConcurrency(delays, async (ms, i) => {
      await sleep(ms);
      return `${i}:${ms}`;
    }, 4);

    expect(results).toEqual(['0:30', '1:5', '2:20', '3:1']);
  });

  it('never runs more workers than the limit', async () => {
    let active = 0;
    let peak = 0;

    await runWithConcurrency(Array.from({ length: 12 }, (_, i) => i), async () => {
      active += 1;
      peak = Math.max(peak, active);
      await sleep(2);
      active -= 1;
    }, 3);

    expect(peak).toBe(3);
  });

  it('treats a non-positive limit as 1', async () => {
    const order: number[] = [];

    await runWithConcurrency([1, 2, 3], async (n) => {
      order.push(n);
    }, 0);

    expect(order).toEqual([1, 2, 3]);
  });

  it('resolves an empty list without calling the worker', async () => {
    expect(await runWithConcurrency([], async () => 1, 5)).toEqual([]);
  });

  it('propagates a worker failure', async () => {
    await expect(
      runWithConcurrency([1, 2], async (n) => {
        if (n === 2) throw new Error('boom');
        return n;
      }, 2)
    ).rejects.toThrow('boom');
  });
});
