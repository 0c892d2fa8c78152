import { z } from 'zod'
import { TargetInputSchema } from './trigger.schema.js'

export const UpgradeItemBodySchema = z.object({
  target: TargetInputSchema,
  id: z.coerce.number().int().positive({ error: 'id must be a positive integer' }),
})

export const UpgradeItemResponseSchema = z.object({
  ok: z.literal(true),
})

export type UpgradeItemBody = z.infer<typeof UpgradeItemBodySchema>
export type UpgradeItemResponse = z.infer<typeof UpgradeItemResponseSchema>
