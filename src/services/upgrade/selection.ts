/** Returns a float in [0, 1), like `Math.random`. */
export type RandomSource = () => number

/**
 * Draws `min(count, items.length)` distinct entries uniformly at random
 * without replacement (partial Fisher-Yates). The input is not modified.
 */
export function sampleDistinct<T>(
  items: readonly T[],
  count: number,
  random: RandomSource = Math.random,
): T[] {
  const pool = [...items]
  const k = Math.max(0, Math.min(Math.floor(count), pool.length))

  for (let i = 0; i < k; i++) {
    const remaining = pool.length - i
    const j = i + Math.min(remaining - 1, Math.floor(random() * remaining))
    ;[pool[i], pool[j]] = [pool[j], pool[i]]
  }

  return pool.slice(0, k)
}
