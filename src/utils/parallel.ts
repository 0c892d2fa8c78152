import pLimit from 'p-limit'

/**
 * Maps `items` through `task` with at most `concurrency` calls in flight.
 *
 * A rejected task does not fail the batch: `onError` is told about it and
 * its item is left out of the result. Results keep the input order.
 */
export async function mapSettled<T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T) => Promise<R>,
  onError: (item: T, error: unknown) => void,
): Promise<R[]> {
  if (items.length === 0) return []

  const limit = pLimit(Math.max(1, concurrency))
  const settled = await Promise.allSettled(
    items.map((item) => limit(() => task(item))),
  )

  const results: R[] = []
  settled.forEach((outcome, index) => {
    if (outcome.status === 'fulfilled') {
      results.push(outcome.value)
    } else {
      onError(items[index], outcome.reason)
    }
  })
  return results
}
