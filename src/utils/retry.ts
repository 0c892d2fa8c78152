/**
 * Retry policy primitives for catalog HTTP calls.
 *
 * Kept free of any I/O so the policy can be exercised without a network.
 */

export const RETRYABLE_STATUS_CODES: ReadonlySet<number> = new Set([
  429, 500, 502, 503, 504,
])

export const RETRYABLE_METHODS: ReadonlySet<string> = new Set([
  'GET',
  'POST',
  'PUT',
  'DELETE',
])

export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number
  /** Base delay in milliseconds, doubled on every attempt */
  backoffFactorMs: number
  maxDelayMs?: number
}

export function isRetryableStatus(status: number): boolean {
  return RETRYABLE_STATUS_CODES.has(status)
}

export function isRetryableMethod(method: string): boolean {
  return RETRYABLE_METHODS.has(method.toUpperCase())
}

/**
 * Capped exponential backoff: `factor * 2^attempt`, clamped to `maxDelayMs`.
 *
 * @param attempt - Zero-based index of the retry about to happen
 * @example
 * computeBackoffDelay(0, 500) // 500
 * computeBackoffDelay(2, 500) // 2000
 */
export function computeBackoffDelay(
  attempt: number,
  backoffFactorMs: number,
  maxDelayMs = 120_000,
): number {
  if (backoffFactorMs <= 0) return 0
  return Math.min(backoffFactorMs * 2 ** attempt, maxDelayMs)
}

export function sleep(ms: number): Promise<void> {
  if (ms <= 0) return Promise.resolve()
  return new Promise((resolve) => setTimeout(resolve, ms))
}
