import { parseArrErrorResponse } from '@utils/arr-error.js'
import { errorMessage, HttpStatusError, TransportError } from '@utils/errors.js'
import {
  computeBackoffDelay,
  isRetryableMethod,
  isRetryableStatus,
  type RetryPolicy,
  sleep,
} from '@utils/retry.js'
import type { FastifyBaseLogger } from 'fastify'

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE'

export type FetchLike = (
  input: string,
  init: RequestInit,
) => Promise<Response>

export interface ArrHttpClientOptions {
  apiKey: string
  timeoutMs: number
  retry: RetryPolicy
  /** Swapped out in tests */
  fetch?: FetchLike
  sleep?: (ms: number) => Promise<void>
}

/**
 * Reliability shim for catalog calls: per-call timeout, bounded retries with
 * capped exponential backoff, and lenient body decoding.
 *
 * Retries cover connection failures and 429/500/502/503/504 responses.
 * Once retries are exhausted a connection failure surfaces as
 * {@link TransportError} and a bad status as {@link HttpStatusError}.
 */
export class ArrHttpClient {
  private readonly fetchImpl: FetchLike
  private readonly sleepImpl: (ms: number) => Promise<void>

  constructor(
    private readonly log: FastifyBaseLogger,
    private readonly options: ArrHttpClientOptions,
  ) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init))
    this.sleepImpl = options.sleep ?? sleep
  }

  get(url: string): Promise<unknown> {
    return this.request('GET', url)
  }

  post(url: string, body: unknown): Promise<unknown> {
    return this.request('POST', url, body)
  }

  put(url: string, body: unknown): Promise<unknown> {
    return this.request('PUT', url, body)
  }

  delete(url: string): Promise<unknown> {
    return this.request('DELETE', url)
  }

  /**
   * Performs one logical request.
   *
   * @returns Parsed JSON, `{}` for an empty body, or the raw text when the
   * body is not JSON
   */
  async request(
    method: HttpMethod,
    url: string,
    body?: unknown,
  ): Promise<unknown> {
    const { retry } = this.options
    const attempts = isRetryableMethod(method)
      ? Math.max(0, retry.maxRetries) + 1
      : 1

    for (let attempt = 0; attempt < attempts; attempt++) {
      const isLastAttempt = attempt === attempts - 1
      let response: Response
      let text: string

      // The timeout signal also covers the body read
      try {
        response = await this.fetchImpl(url, {
          method,
          headers: this.headers(body !== undefined),
          body: body === undefined ? undefined : JSON.stringify(body),
          signal: AbortSignal.timeout(this.options.timeoutMs),
        })
        text = await response.text()
      } catch (error) {
        if (isLastAttempt) {
          throw new TransportError(
            `${method} ${url} failed: ${errorMessage(error)}`,
            url,
            { cause: error },
          )
        }
        this.log.warn(
          { method, url, attempt: attempt + 1, error: errorMessage(error) },
          'Request failed, retrying',
        )
        await this.backoff(attempt)
        continue
      }

      if (response.ok) {
        return decodeBody(text)
      }

      if (isRetryableStatus(response.status) && !isLastAttempt) {
        this.log.warn(
          { method, url, attempt: attempt + 1, status: response.status },
          'Retryable status received, retrying',
        )
        await this.backoff(attempt)
        continue
      }

      const detail = parseArrErrorResponse(decodeBody(text))
      throw new HttpStatusError(
        `${method} ${url} answered ${response.status}${detail ? `: ${detail}` : ''}`,
        response.status,
        url,
      )
    }

    // attempts is always at least 1, so the loop returns or throws
    throw new TransportError(`${method} ${url} was never attempted`, url)
  }

  private headers(hasBody: boolean): Record<string, string> {
    const headers: Record<string, string> = {
      'X-Api-Key': this.options.apiKey,
      Accept: 'application/json',
    }
    if (hasBody) {
      headers['Content-Type'] = 'application/json'
    }
    return headers
  }

  private backoff(attempt: number): Promise<void> {
    const { backoffFactorMs, maxDelayMs } = this.options.retry
    return this.sleepImpl(
      computeBackoffDelay(attempt, backoffFactorMs, maxDelayMs),
    )
  }
}

function decodeBody(text: string): unknown {
  if (text.trim().length === 0) {
    return {}
  }
  try {
    return JSON.parse(text)
  } catch {
    return text
  }
}
