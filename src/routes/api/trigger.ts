import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  TriggerBodySchema,
  TriggerResponseSchema,
} from '@schemas/upgrade/trigger.schema.js'
import { resolveTarget } from '@services/upgrade/targets.js'
import { errorMessage } from '@utils/errors.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Body: z.infer<typeof TriggerBodySchema>
    Reply: z.infer<typeof TriggerResponseSchema>
  }>(
    '/trigger',
    {
      schema: {
        summary: 'Trigger an upgrade run',
        operationId: 'triggerUpgradeRun',
        description:
          'Starts an upgrade run in the background and answers immediately. A second trigger while a run is in flight is rejected, never queued.',
        body: TriggerBodySchema,
        response: {
          202: TriggerResponseSchema,
          400: ErrorSchema,
          401: ErrorSchema,
          403: ErrorSchema,
          409: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Upgrades'],
      },
    },
    async (request, reply) => {
      const target = resolveTarget(request.body.target)
      const result = fastify.runCoordinator.trigger(target)

      if (!result.accepted) {
        return reply.conflict('Run already in progress')
      }

      result.run.catch((error) => {
        fastify.log.error(
          { error },
          `Background upgrade run crashed: ${errorMessage(error)}`,
        )
      })

      reply.status(202)
      return { accepted: true as const }
    },
  )
}

export default plugin
