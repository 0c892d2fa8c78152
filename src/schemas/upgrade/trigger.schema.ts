import { TARGET_INPUTS } from '@services/upgrade/targets.js'
import { z } from 'zod'

export const TargetInputSchema = z.enum(TARGET_INPUTS, {
  error: "target must be one of 'movies', 'episodes', 'both', 'radarr', 'sonarr'",
})

export const TriggerBodySchema = z
  .object({
    target: TargetInputSchema.default('both'),
  })
  .default({ target: 'both' })

export const TriggerResponseSchema = z.object({
  accepted: z.literal(true),
})

export type TriggerBody = z.infer<typeof TriggerBodySchema>
export type TriggerResponse = z.infer<typeof TriggerResponseSchema>
