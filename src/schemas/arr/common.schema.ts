import { z } from 'zod'

// Catalog payloads are parsed loosely: unknown fields survive so that a
// re-fetched resource can be PUT back without losing data.

export const ArrTagSchema = z.object({
  id: z.number().int(),
  label: z.string(),
})

export const ArrQualityProfileSchema = z.looseObject({
  id: z.number().int(),
  name: z.string().optional(),
  cutoffFormatScore: z.number().int().catch(0).default(0),
})

export const ArrCommandResponseSchema = z.looseObject({
  id: z.number().int().optional(),
  name: z.string().optional(),
  status: z.string().optional(),
})

export const ArrQueueRecordSchema = z.looseObject({
  id: z.number().int().optional(),
  title: z.string().nullish(),
  status: z.string().nullish(),
  protocol: z.string().nullish(),
  size: z.number().nullish(),
  sizeleft: z.number().nullish(),
  timeleft: z.string().nullish(),
  errorMessage: z.string().nullish(),
  indexer: z.string().nullish(),
  downloadId: z.string().nullish(),
  movieId: z.number().int().nullish(),
  seriesId: z.number().int().nullish(),
  episodeId: z.number().int().nullish(),
  seasonNumber: z.number().int().nullish(),
  episode: z
    .looseObject({
      episodeNumber: z.number().int().nullish(),
      seasonNumber: z.number().int().nullish(),
      title: z.string().nullish(),
    })
    .nullish(),
  series: z
    .looseObject({
      title: z.string().nullish(),
    })
    .nullish(),
})

export type ArrTag = z.infer<typeof ArrTagSchema>
export type ArrQualityProfile = z.infer<typeof ArrQualityProfileSchema>
export type ArrCommandResponse = z.infer<typeof ArrCommandResponseSchema>
export type ArrQueueRecord = z.infer<typeof ArrQueueRecordSchema>
