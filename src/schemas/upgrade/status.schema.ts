import { z } from 'zod'

export const CatalogKindSchema = z.enum(['movies', 'episodes'])
export const UpgradeTargetSchema = z.enum(['movies', 'episodes', 'both'])

export const RecentUpgradeSchema = z.object({
  id: z.number(),
  title: z.string(),
  seriesId: z.number().optional(),
})

export const CycleOutcomeSchema = z.discriminatedUnion('state', [
  z.object({ kind: CatalogKindSchema, state: z.literal('disabled') }),
  z.object({
    kind: CatalogKindSchema,
    state: z.literal('full-cycle-reset'),
    resetCount: z.number(),
  }),
  z.object({
    kind: CatalogKindSchema,
    state: z.literal('no-candidates'),
    scanned: z.number(),
  }),
  z.object({
    kind: CatalogKindSchema,
    state: z.literal('upgraded'),
    selected: z.array(RecentUpgradeSchema),
    searchedIds: z.array(z.number()),
  }),
  z.object({
    kind: CatalogKindSchema,
    state: z.literal('failed'),
    error: z.string(),
  }),
])

export const RunResultSchema = z.object({
  ok: z.boolean(),
  target: UpgradeTargetSchema,
  outcomes: z.array(CycleOutcomeSchema),
  error: z.string().optional(),
})

export const RunStatusResponseSchema = z.object({
  started: z.string().nullable(),
  finished: z.string().nullable(),
  running: z.boolean(),
  lastResult: RunResultSchema.nullable(),
})

export type RunStatusResponse = z.infer<typeof RunStatusResponseSchema>
