import { describe, it, expect } from 'vitest';
import { runBounded } from '../../src/application/worker-pool.js';
import { sleep } from '../helpers.js';

describe('runBounded', () => {
  it('runs every item without exceeding the limit', async () => {
    let active = 0;
    let peak = 0;
    const done: number[] = [];

    await runBounded([5, 1, 4, 2, 3, 1, 2, 5, 1, 3], 3, async (delay, index) => {
      active++;
      peak = Math.max(peak, active);
      await sleep(delay);
      active--;
      done.push(index);
    });

    expect(peak).toBe(3);
    expect([...done].sort((a, b) => a - b)).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8, 9]);
  });

  it('handles a limit larger than the item count', async () => {
    const seen: string[] = [];
    await runBounded(['a', 'b'], 8, async (item) => {
      seen.push(item);
    });
    expect(seen).toEqual(['a', 'b']);
  });

  it('resolves immediately for no items', async () => {
    await expect(runBounded([], 2, async () => {})).resolves.toBeUndefined();
  });

  it('rejects a non-positive limit', async () => {
    await expect(runBounded([1], 0, async () => {})).rejects.toThrow(RangeError);
  });

  it('stops admitting items once the signal aborts', async () => {
    const controller = new AbortController();
    const started: number[] = [];

    await runBounded(
      [0, 1, 2],
      1,
      async (item) => {
        started.push(item);
        controller.abort();
      },
      controller.signal,
    );

    expect(started).toEqual([0]);
  });

  it('rethrows the first task error after running tasks settle', async () => {
    const started: number[] = [];

    await expect(
      runBounded([1, 2, 3], 1, async (item) => {
        started.push(item);
        if (item === 2) throw new Error('boom 2');
      }),
    ).rejects.toThrow('boom 2');

    expect(started).toEqual([1, 2]);
  });

  it('rethrows the earliest failure when several lanes fail', async () => {
    await expect(
      runBounded([5, 20], 2, async (delay) => {
        await sleep(delay);
        throw new Error(`failed after ${delay}`);
      }),
    ).rejects.toThrow('failed after 5');
  });
});
