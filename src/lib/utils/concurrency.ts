/**
 * Map over items with at most `limit` promises in flight. Results keep the
 * input order. After the first rejection no new items are started; the call
 * rejects with that error once the calls already running have settled.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const errors: unknown[] = [];

  async function run(): Promise<void> {
    while (next < items.length && errors.length === 0) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        results[index] = await fn(item, index);
      } catch (error) {
        errors.push(error);
      }
    }
  }

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => run());
  await Promise.all(workers);

  if (errors.length > 0) throw errors[0];
  return results;
}
