import { ErrorSchema } from '@schemas/common/error.schema.js'
import { isFlagSet } from '@schemas/common/query.schema.js'
import {
  UpgradeSummaryQuerySchema,
  UpgradeSummaryResponseSchema,
} from '@schemas/upgrade/summary.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Querystring: z.infer<typeof UpgradeSummaryQuerySchema>
    Reply: z.infer<typeof UpgradeSummaryResponseSchema>
  }>(
    '/upgrade-summary',
    {
      schema: {
        summary: 'Get upgrade summary',
        operationId: 'getUpgradeSummary',
        description:
          'Per catalog: how many monitored items sit below their profile cutoff and how many of those are still eligible. `detailed=true` lists the below-cutoff items.',
        querystring: UpgradeSummaryQuerySchema,
        response: {
          200: UpgradeSummaryResponseSchema,
          401: ErrorSchema,
          403: ErrorSchema,
          500: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Upgrades'],
      },
    },
    async (request, reply) => {
      const detailed = isFlagSet(request.query.detailed)
      try {
        return await fastify.upgradeEngine.getUpgradeSummary(detailed)
      } catch (err) {
        if (err instanceof Error && 'statusCode' in err) {
          throw err
        }

        logRouteError(fastify.log, request, err, {
          message: 'Failed to build upgrade summary',
          context: { detailed },
        })
        return reply.internalServerError('Unable to build upgrade summary')
      }
    },
  )
}

export default plugin
