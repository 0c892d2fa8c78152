import { arrClientConfigFrom } from '@services/arr/client-config.js'
import { RadarrService } from '@services/radarr.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    /** null when radarrUrl or radarrApiKey is not configured */
    radarr: RadarrService | null
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const clientConfig = arrClientConfigFrom(fastify.config, 'radarr')
    fastify.decorate(
      'radarr',
      clientConfig ? new RadarrService(fastify.log, clientConfig) : null,
    )
  },
  {
    name: 'radarr',
    dependencies: ['config'],
  },
)
