/**
 * Map the items through an async function with at most `concurrency`
 * calls in flight - the results are in item order no matter what order
 * the calls complete in.
 *
 * @param items
 * @param concurrency the maximum calls in flight (at least 1)
 * @param fn
 */
export async function mapInOrder<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);

  let next = 0;

  const worker = async () => {
    while (next < items.length) {
      const index = next++;
      results[index] = await fn(items[index], index);
    }
  };

  const workerCount = Math.max(1, Math.min(concurrency, items.length));

  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return results;
}
