/**
 * Runs `worker` over `items` with at most `limit` calls in flight.
 * Results are returned (and reported through `onResult`) in completion order,
 * not submission order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T) => Promise<R>,
  onResult?: (result: R, item: T) => void,
): Promise<R[]> {
  const results: R[] = [];
  const workerCount = Math.max(
    1,
    Math.min(Number.isFinite(limit) ? Math.floor(limit) : 1, items.length),
  );
  let cursor = 0;

  const runWorker = async (): Promise<void> => {
    while (cursor < items.length) {
      const item = items[cursor];
      cursor += 1;
      const result = await worker(item);
      results.push(result);
      onResult?.(result, item);
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));
  return results;
}

/** Serializes async critical sections; tasks run one at a time in call order. */
export class ExclusiveLock {
  private tail: Promise<void> = Promise.resolve();

  runExclusive<T>(task: () => T | Promise<T>): Promise<T> {
    const run = this.tail.then(task);
    // the caller observes failures through `run`; the chain only needs to advance
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }
}
