/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 *
 * Results keep input order regardless of completion order. After the first
 * failure no new items are started; in-flight calls finish and the first
 * error is rethrown.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const failures: unknown[] = [];
  let next = 0;

  async function drain(): Promise<void> {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failures.push(error);
      }
    }
  }

  const workerCount = Math.min(Math.max(1, Math.floor(limit)), items.length);
  await Promise.all(Array.from({ length: workerCount }, () => drain()));

  if (failures.length > 0) {
    throw failures[0];
  }
  return results;
}
