/**
 * Runs `task` for every item with at most `concurrency` in flight. Results
 * are stored by input index, so completion order never leaks into the
 * returned array. `task` is expected to settle on its own; a rejection
 * rejects the whole run.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  async function worker() {
    while (next < items.length) {
      const index = next++;
      results[index] = await task(items[index], index);
    }
  }

  const size = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  await Promise.all(Array.from({ length: size }, () => worker()));

  return results;
}
