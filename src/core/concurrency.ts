/**
 * Runs `worker` over `items` with at most `concurrency` calls in flight. Results are
 * stored by input position, so the returned array follows `items` order regardless of
 * completion order. A rejected worker rejects the whole call; workers that must not
 * affect their siblings catch their own errors.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const width = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let index = 0;
  const slots = new Array(width).fill(null).map(async () => {
    while (true) {
      const current = index;
      index += 1;
      if (current >= items.length) {
        break;
      }
      results[current] = await worker(items[current], current);
    }
  });
  await Promise.all(slots);
  return results;
}
