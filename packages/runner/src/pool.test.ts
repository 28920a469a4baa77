import { describe, expect, it } from 'vitest';
import { runPool } from './pool.js';

function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

describe('runPool', () => {
  it('returns results in input order whatever the completion order', async () => {
    const waits = [30, 5, 20, 0, 10];
    const finished: number[] = [];

    const results = await runPool(waits, 3, async (ms, index) => {
      await delay(ms);
      finished.push(index);
      return index * 10;
    });

    expect(results).toEqual([0, 10, 20, 30, 40]);
    expect(finished).not.toEqual([0, 1, 2, 3, 4]);
  });

  it('never runs more tasks at once than there are workers', async () => {
    let active = 0;
    let peak = 0;

    await runPool(Array.from({ length: 10 }, (_, i) => i), 4, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(2);
      active--;
    });

    expect(peak).toBe(4);
  });

  it('runs sequentially with one worker', async () => {
    const order: string[] = [];
    await runPool(['a', 'b', 'c'], 1, async (item) => {
      order.push(`start ${item}`);
      await delay(1);
      order.push(`end ${item}`);
    });

    expect(order).toEqual(['start a', 'end a', 'start b', 'end b', 'start c', 'end c']);
  });

  it('handles an empty list', async () => {
    await expect(runPool([], 4, async () => 1)).resolves.toEqual([]);
  });

  it('rejects an invalid worker count', async () => {
    await expect(runPool([1], 0, async () => 1)).rejects.toThrow(RangeError);
  });

  it('rejects when a task rejects', async () => {
    await expect(
      runPool([1, 2], 2, async (n) => {
        if (n === 2) throw new Error('scheduler broke');
        return n;
      })
    ).rejects.toThrow('scheduler broke');
  });
});
