/**
 * Runs `task` over `items` with at most `concurrency` tasks in flight.
 * Results keep the input order regardless of completion order; the first rejection
 * stops workers from picking up new items and is rethrown after in-flight tasks settle.
 */
export const mapWithConcurrency = async <TItem, TResult>(
  items: readonly TItem[],
  concurrency: number,
  task: (item: TItem, index: number) => Promise<TResult>,
): Promise<TResult[]> => {
  const results = new Array<TResult>(items.length);
  const slots = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;
  let failure: { error: unknown } | undefined;

  const worker = async (): Promise<void> => {
    while (!failure && next < items.length) {
      const index = next;
      next += 1;
      const item = items[index];
      if (item === undefined) continue;

      try {
        results[index] = await task(item, index);
      } catch (error) {
        failure ??= { error };
      }
    }
  };

  await Promise.all(Array.from({ length: slots }, () => worker()));

  if (failure) {
    throw failure.error;
  }

  return results;
};
