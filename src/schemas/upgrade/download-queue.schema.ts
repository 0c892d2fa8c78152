import { QueryFlagSchema } from '@schemas/common/query.schema.js'
import { z } from 'zod'
import { RecentUpgradeSchema } from './status.schema.js'

export const DownloadQueueQuerySchema = z.object({
  tagged: QueryFlagSchema,
  eligible: QueryFlagSchema,
})

const MovieQueueEntrySchema = z.object({
  title: z.string().nullable(),
  status: z.string().nullable(),
  protocol: z.string().nullable(),
  size: z.number().meta({ description: 'GiB' }),
  sizeLeft: z.number().meta({ description: 'GiB' }),
  timeLeft: z.string().nullable(),
  errorMessage: z.string().nullable(),
  indexer: z.string().nullable(),
  downloadId: z.string().nullable(),
})

const EpisodeQueueEntrySchema = z.object({
  series: z.string(),
  episode: z.string().meta({ description: 'SxxEyy, Sxx or -' }),
  status: z.string(),
  protocol: z.string(),
  size: z.number().meta({ description: 'GiB' }),
  sizeLeft: z.number().meta({ description: 'GiB' }),
  timeLeft: z.string(),
  indexer: z.string(),
  downloadId: z.string().nullable(),
})

const EligibleEntrySchema = z.object({
  id: z.number(),
  title: z.string(),
  status: z.string(),
  score: z.number(),
  cutoff: z.number(),
  series: z.string().optional(),
  episode: z.string().optional(),
})

export const DownloadQueueResponseSchema = z.discriminatedUnion('mode', [
  z.object({
    mode: z.literal('tagged'),
    movies: z.array(RecentUpgradeSchema),
    episodes: z.array(RecentUpgradeSchema),
  }),
  z.object({
    mode: z.literal('eligible'),
    movies: z.array(EligibleEntrySchema),
    episodes: z.array(EligibleEntrySchema),
    moviesError: z.string().optional(),
    episodesError: z.string().optional(),
  }),
  z.object({
    mode: z.literal('queue'),
    movies: z.array(MovieQueueEntrySchema),
    episodes: z.array(EpisodeQueueEntrySchema),
    moviesError: z.string().optional(),
    episodesError: z.string().optional(),
  }),
])

export type DownloadQueueQuery = z.infer<typeof DownloadQueueQuerySchema>
export type DownloadQueueResponse = z.infer<typeof DownloadQueueResponseSchema>
