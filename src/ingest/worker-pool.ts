/**
 * Run tasks with at most `concurrency` in flight. Results keep input order.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let currentIndex = 0;

  const worker = async (): Promise<void> => {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];
      if (item === undefined) break;
      results[index] = await task(item, index);
    }
  };

  const workers: Promise<void>[] = [];
  const size = Math.max(1, Math.min(concurrency, items.length));
  for (let i = 0; i < size; i++) {
    workers.push(worker());
  }

  await Promise.all(workers);
  return results;
}
