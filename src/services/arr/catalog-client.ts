import type { CatalogCommonOperations } from '@root/types/catalog.types.js'
import {
  type ArrCommandResponse,
  ArrCommandResponseSchema,
  ArrQualityProfileSchema,
  type ArrQueueRecord,
  ArrQueueRecordSchema,
  type ArrTag,
  ArrTagSchema,
} from '@schemas/arr/common.schema.js'
import { HttpStatusError } from '@utils/errors.js'
import { createServiceLogger } from '@utils/logger.js'
import type { RetryPolicy } from '@utils/retry.js'
import { normalizeTagLabel } from '@utils/tags.js'
import { buildArrUrl, withQuery } from '@utils/url.js'
import type { FastifyBaseLogger } from 'fastify'
import { z } from 'zod'
import { ArrHttpClient, type FetchLike } from './http-client.js'

export interface ArrClientConfig {
  baseUrl: string
  apiKey: string
  apiPath: string
  timeoutMs: number
  retry: RetryPolicy
}

export interface ArrClientHooks {
  fetch?: FetchLike
  sleep?: (ms: number) => Promise<void>
}

const PagedRecordsSchema = z.looseObject({ records: z.array(z.unknown()) })

/**
 * Unwraps `{ records: [...] }` paged payloads; bare arrays pass through and
 * anything else becomes an empty list.
 */
export function unwrapRecords(payload: unknown): unknown[] {
  if (Array.isArray(payload)) return payload
  const paged = PagedRecordsSchema.safeParse(payload)
  return paged.success ? paged.data.records : []
}

/**
 * Base class for the Radarr and Sonarr clients.
 */
export abstract class ArrCatalogClient implements CatalogCommonOperations {
  protected readonly log: FastifyBaseLogger
  protected readonly http: ArrHttpClient

  protected constructor(
    baseLog: FastifyBaseLogger,
    serviceName: string,
    protected readonly config: ArrClientConfig,
    hooks: ArrClientHooks = {},
  ) {
    this.log = createServiceLogger(baseLog, serviceName)
    this.http = new ArrHttpClient(this.log, {
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      retry: config.retry,
      fetch: hooks.fetch,
      sleep: hooks.sleep,
    })
  }

  protected url(...parts: Array<string | number>): string {
    return buildArrUrl(this.config.baseUrl, this.config.apiPath, ...parts)
  }

  protected urlWithQuery(
    parts: Array<string | number>,
    params: Record<string, string | number | boolean | undefined>,
  ): string {
    return withQuery(this.url(...parts), params)
  }

  async listTags(): Promise<ArrTag[]> {
    const payload = await this.http.get(this.url('tag'))
    return z.array(ArrTagSchema).parse(unwrapRecords(payload))
  }

  /**
   * Looks the tag up by label and creates it on a miss.
   *
   * A 409 on create means another writer created it first; the id is then
   * read back from the tag list.
   */
  async ensureTag(label: string): Promise<number> {
    const normalized = normalizeTagLabel(label)
    const existing = await this.findTag(normalized)
    if (existing) return existing.id

    try {
      const created = ArrTagSchema.parse(
        await this.http.post(this.url('tag'), { label: normalized }),
      )
      this.log.info(`Created new tag '${normalized}' with id=${created.id}`)
      return created.id
    } catch (error) {
      if (error instanceof HttpStatusError && error.status === 409) {
        this.log.debug(`Tag '${normalized}' already exists, re-reading tags`)
        const raced = await this.findTag(normalized)
        if (raced) return raced.id
      }
      throw error
    }
  }

  /** Maps quality profile id to its custom format cutoff score. */
  async getQualityProfileCutoffs(): Promise<Map<number, number>> {
    const profiles = z
      .array(ArrQualityProfileSchema)
      .parse(await this.http.get(this.url('qualityprofile')))
    return new Map(
      profiles.map((profile) => [profile.id, profile.cutoffFormatScore]),
    )
  }

  async listQueue(): Promise<ArrQueueRecord[]> {
    const payload = await this.http.get(
      this.urlWithQuery(['queue'], this.queueParams()),
    )
    if (
      !Array.isArray(payload) &&
      !PagedRecordsSchema.safeParse(payload).success
    ) {
      this.log.warn('Queue returned an unexpected payload, treating as empty')
      return []
    }
    return z.array(ArrQueueRecordSchema).parse(unwrapRecords(payload))
  }

  protected queueParams(): Record<string, string | number | boolean> {
    return { pageSize: 1000 }
  }

  /** Fires a named background job on the catalog service. */
  protected async command(
    name: string,
    payload: Record<string, unknown>,
  ): Promise<ArrCommandResponse> {
    const response = await this.http.post(this.url('command'), {
      name,
      ...payload,
    })
    const parsed = ArrCommandResponseSchema.safeParse(response)
    return parsed.success ? parsed.data : {}
  }

  private async findTag(label: string): Promise<ArrTag | undefined> {
    const tags = await this.listTags()
    return tags.find((tag) => normalizeTagLabel(tag.label) === label)
  }
}
