import { ErrorSchema } from '@schemas/common/error.schema.js'
import { isFlagSet } from '@schemas/common/query.schema.js'
import {
  DownloadQueueQuerySchema,
  DownloadQueueResponseSchema,
} from '@schemas/upgrade/download-queue.schema.js'
import type { DownloadQueueMode } from '@services/upgrade-engine.service.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

type DownloadQueueQuery = z.infer<typeof DownloadQueueQuerySchema>

function modeFor(query: DownloadQueueQuery): DownloadQueueMode {
  if (isFlagSet(query.tagged)) return 'tagged'
  if (isFlagSet(query.eligible)) return 'eligible'
  return 'queue'
}

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Querystring: DownloadQueueQuery
    Reply: z.infer<typeof DownloadQueueResponseSchema>
  }>(
    '/download-queue',
    {
      schema: {
        summary: 'Get download queue',
        operationId: 'getDownloadQueue',
        description:
          'Live download queues of both catalogs. `tagged=true` returns the recent upgrades instead, `eligible=true` the items a cycle could pick.',
        querystring: DownloadQueueQuerySchema,
        response: {
          200: DownloadQueueResponseSchema,
          401: ErrorSchema,
          403: ErrorSchema,
          500: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Queue'],
      },
    },
    async (request, reply) => {
      const mode = modeFor(request.query)
      try {
        return await fastify.upgradeEngine.getDownloadQueue(mode)
      } catch (err) {
        if (err instanceof Error && 'statusCode' in err) {
          throw err
        }

        logRouteError(fastify.log, request, err, {
          message: 'Failed to load download queue',
          context: { mode },
        })
        return reply.internalServerError('Unable to load download queue')
      }
    },
  )
}

export default plugin
