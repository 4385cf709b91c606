import os from "node:os";

export function defaultConcurrency(): number {
  const available = os.availableParallelism();
  return Number.isFinite(available) && available > 0 ? available : 1;
}

/**
 * Run `task` over `items` with at most `concurrency` in flight. Each result
 * lands in the slot of its input, so the output order matches `items`
 * whatever order the tasks finish in.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      const item = items[index];
      if (item === undefined) {
        continue;
      }
      results[index] = await task(item, index);
    }
  };

  const limit = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;
  const workerCount = Math.min(limit, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));
  return results;
}
