import { ErrorSchema } from '@schemas/common/error.schema.js'
import { RunStatusResponseSchema } from '@schemas/upgrade/status.schema.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Reply: z.infer<typeof RunStatusResponseSchema> }>(
    '/status',
    {
      schema: {
        summary: 'Get run status',
        operationId: 'getRunStatus',
        description:
          'Start and finish time of the latest upgrade run, whether one is in flight and its result',
        response: {
          200: RunStatusResponseSchema,
          401: ErrorSchema,
          403: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['System'],
      },
    },
    async () => {
      return fastify.runState.getStatus()
    },
  )
}

export default plugin
