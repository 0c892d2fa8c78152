import { z } from 'zod'
import { RecentUpgradeSchema } from './status.schema.js'

export const RecentUpgradesResponseSchema = z.object({
  movies: z.array(RecentUpgradeSchema),
  episodes: z.array(RecentUpgradeSchema),
})

export type RecentUpgradesResponse = z.infer<
  typeof RecentUpgradesResponseSchema
>
