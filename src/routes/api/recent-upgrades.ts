import { ErrorSchema } from '@schemas/common/error.schema.js'
import { RecentUpgradesResponseSchema } from '@schemas/upgrade/recent-upgrades.schema.js'
import type { FastifyPluginAsync } from 'fastify'
import type { z } from 'zod'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{ Reply: z.infer<typeof RecentUpgradesResponseSchema> }>(
    '/recent-upgrades',
    {
      schema: {
        summary: 'Get recent upgrades',
        operationId: 'getRecentUpgrades',
        description:
          'Items tagged and searched by the most recent cycle of each catalog. Kept in memory only.',
        response: {
          200: RecentUpgradesResponseSchema,
          401: ErrorSchema,
          403: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Upgrades'],
      },
    },
    async () => {
      return fastify.upgradeEngine.getRecentUpgrades()
    },
  )
}

export default plugin
