/**
 * Bounded worker pool
 * A fixed number of async workers drain a shared queue; each item is handed
 * to exactly one worker and items may finish in any order.
 */

import { availableParallelism } from "node:os";

export function defaultPoolSize(): number {
  return Math.max(1, availableParallelism());
}

export async function runPool<T>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<void>,
): Promise<void> {
  const size = Math.max(1, Math.min(limit, items.length || 1));
  let next = 0;

  const workers = Array.from({ length: size }, async () => {
    while (next < items.length) {
      const index = next++;
      await fn(items[index], index);
    }
  });

  await Promise.all(workers);
}
