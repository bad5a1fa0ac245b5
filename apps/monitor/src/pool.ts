/**
 * Runs `fn` over `items` with at most `workers` calls in flight.
 * Results keep input order. The first rejection rejects the call; callers that
 * need per-item isolation catch inside `fn`.
 */
export async function mapWithConcurrency<T, R>(
  items: ReadonlyArray<T>,
  workers: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  if (!Number.isInteger(workers) || workers < 1) throw new Error(`invalid workers: ${workers}`);

  const results = new Array<R>(items.length);
  let next = 0;

  async function worker(): Promise<void> {
    while (next < items.length) {
      const i = next++;
      results[i] = await fn(items[i], i);
    }
  }

  const lanes = Array.from({ length: Math.min(workers, items.length) }, () => worker());
  await Promise.all(lanes);
  return results;
}
