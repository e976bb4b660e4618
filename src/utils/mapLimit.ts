// Run fn over items with at most `limit` calls in flight; results keep input order
export async function mapLimit<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const settled = await mapLimitSettled(items, limit, fn);
  return settled.map((result, index) => {
    if (result.status === 'rejected') {
      throw new Error(`Error processing item at index ${index}: ${String(result.reason)}`, { cause: result.reason });
    }
    return result.value;
  });
}

// Same as mapLimit but never rejects; failures are reported per item
export async function mapLimitSettled<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  if (limit <= 0) {
    throw new Error('Limit must be greater than 0');
  }

  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const currentIndex = next++;
      const item = items[currentIndex];
      if (item === undefined) {
        results[currentIndex] = { status: 'rejected', reason: new Error(`Item at index ${currentIndex} is undefined`) };
        continue;
      }
      try {
        results[currentIndex] = { status: 'fulfilled', value: await fn(item, currentIndex) };
      } catch (error) {
        results[currentIndex] = { status: 'rejected', reason: error };
      }
    }
  };

  const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
  await Promise.all(workers);

  return results;
}
