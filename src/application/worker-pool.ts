/**
 * Runs `task` over `items` with at most `limit` tasks in flight.
 *
 * Each lane pulls the next unstarted item as soon as its current task
 * settles. Once `signal` aborts, no new items are started; tasks already
 * running are left to observe the signal themselves.
 *
 * Tasks are expected to settle their own errors. If one throws anyway,
 * the pool stops admitting work, waits for the running tasks and
 * rethrows the first error.
 */
export async function runBounded<T>(
  items: readonly T[],
  limit: number,
  task: (item: T, index: number) => Promise<void>,
  signal?: AbortSignal,
): Promise<void> {
  if (!Number.isInteger(limit) || limit < 1) {
    throw new RangeError(`Concurrency limit must be a positive integer, got ${limit}`);
  }

  let next = 0;
  const errors: unknown[] = [];

  const lane = async (): Promise<void> => {
    while (next < items.length && errors.length === 0 && !signal?.aborted) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        await task(item, index);
      } catch (err: unknown) {
        errors.push(err);
      }
    }
  };

  const lanes = Array.from({ length: Math.min(limit, items.length) }, () => lane());
  await Promise.all(lanes);

  if (errors.length > 0) {
    throw errors[0];
  }
}
