import { availableParallelism } from "os"

/** Default worker count: one per available CPU. */
export function defaultConcurrency(): number {
  return Math.max(1, availableParallelism())
}

/**
 * Runs `worker` over every item with at most `limit` calls in flight.
 * Results keep input order. The first rejection rejects the whole call,
 * so workers that must not fail should return their error as a value.
 */
export async function mapPool<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length)
  let next = 0

  const run = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++
      results[index] = await worker(items[index], index)
    }
  }

  const size = Math.max(1, Math.min(limit, items.length))
  await Promise.all(Array.from({ length: size }, run))
  return results
}
