export type Settled<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown };

/**
 * Runs `fn` over `items` with at most `concurrency` calls in flight.
 * Results come back in input order; a failing item never stops the others.
 */
export async function runWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>,
): Promise<Settled<R>[]> {
  const results: Settled<R>[] = new Array(items.length);
  const workers = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length || 1));
  let next = 0;

  async function worker(): Promise<void> {
    while (true) {
      const current = next;
      next += 1;
      if (current >= items.length) {
        break;
      }
      try {
        results[current] = { status: 'fulfilled', value: await fn(items[current], current) };
      } catch (reason) {
        results[current] = { status: 'rejected', reason };
      }
    }
  }

  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
