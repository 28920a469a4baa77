/**
 * Fixed-size worker pool over an ordered task list.
 *
 * `workers` loops pull the next index from a shared cursor and write their
 * result into a buffer slot keyed by that index, so the returned array follows
 * input order whatever the completion order was. A rejected task is a harness
 * failure and rejects the whole pool.
 */
export async function runPool<T, R>(
  items: readonly T[],
  workers: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(workers) || workers < 1) {
    throw new RangeError(`workers must be a positive integer, got ${workers}`);
  }

  const slots: { value: R }[] = new Array(items.length);
  let cursor = 0;

  async function work(): Promise<void> {
    while (cursor < items.length) {
      const index = cursor++;
      slots[index] = { value: await task(items[index], index) };
    }
  }

  const size = Math.min(workers, items.length);
  await Promise.all(Array.from({ length: size }, () => work()));

  return Array.from({ length: items.length }, (_, index) => {
    const slot = slots[index];
    if (slot === undefined) {
      throw new Error(`Worker pool finished without a result for item ${index}`);
    }
    return slot.value;
  });
}
