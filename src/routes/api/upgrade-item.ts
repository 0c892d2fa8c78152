import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  UpgradeItemBodySchema,
  UpgradeItemResponseSchema,
} from '@schemas/upgrade/upgrade-item.schema.js'
import { resolveTarget } from '@services/upgrade/targets.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.post<{
    Body: z.infer<typeof UpgradeItemBodySchema>
    Reply: z.infer<typeof UpgradeItemResponseSchema>
  }>(
    '/upgrade-item',
    {
      schema: {
        summary: 'Upgrade a single item',
        operationId: 'upgradeItem',
        description:
          'Tags one movie (or the series of one episode) with the upgrade tag and searches it. For episodes `id` is an episode id.',
        body: UpgradeItemBodySchema,
        response: {
          200: UpgradeItemResponseSchema,
          400: ErrorSchema,
          401: ErrorSchema,
          403: ErrorSchema,
          422: ErrorSchema,
          500: ErrorSchema,
          502: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Upgrades'],
      },
    },
    async (request, reply) => {
      const { id } = request.body
      const target = resolveTarget(request.body.target)
      try {
        await fastify.upgradeEngine.upgradeItem(target, id)
        return { ok: true as const }
      } catch (err) {
        if (err instanceof Error && 'statusCode' in err) {
          throw err
        }

        logRouteError(fastify.log, request, err, {
          message: 'Failed to upgrade item',
          context: { target, id },
        })
        return reply.internalServerError('Unable to upgrade item')
      }
    },
  )
}

export default plugin
