import { QueryFlagSchema } from '@schemas/common/query.schema.js'
import { z } from 'zod'

export const UpgradeSummaryQuerySchema = z.object({
  detailed: QueryFlagSchema,
})

export const SummaryItemSchema = z.object({
  id: z.number(),
  title: z.string(),
  score: z.number(),
  cutoff: z.number(),
  tagged: z.boolean(),
  seriesId: z.number().optional(),
})

export const KindSummarySchema = z.object({
  enabled: z.boolean(),
  totalBelowCutoff: z.number(),
  eligibleForUpgrade: z.number(),
  items: z.array(SummaryItemSchema).optional(),
  error: z.string().optional(),
})

export const UpgradeSummaryResponseSchema = z.object({
  movies: KindSummarySchema,
  episodes: KindSummarySchema,
})

export type UpgradeSummaryQuery = z.infer<typeof UpgradeSummaryQuerySchema>
export type UpgradeSummaryResponse = z.infer<
  typeof UpgradeSummaryResponseSchema
>
