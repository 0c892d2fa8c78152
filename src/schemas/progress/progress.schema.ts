import { z } from 'zod'

export const ProgressEventSchema = z.object({
  sequence: z.number().int(),
  type: z.enum(['info', 'error', 'done']),
  message: z.string(),
  timestamp: z.string(),
})

export const ProgressStreamResponseSchema = z
  .string()
  .meta({
    description:
      'text/event-stream; each message carries `event: <type>`, `id: <sequence>` and the JSON event as data',
  })

export type ProgressEventPayload = z.infer<typeof ProgressEventSchema>
