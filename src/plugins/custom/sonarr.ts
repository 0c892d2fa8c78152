import { arrClientConfigFrom } from '@services/arr/client-config.js'
import { SonarrService } from '@services/sonarr.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    /** null when sonarrUrl or sonarrApiKey is not configured */
    sonarr: SonarrService | null
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const clientConfig = arrClientConfigFrom(fastify.config, 'sonarr')
    fastify.decorate(
      'sonarr',
      clientConfig ? new SonarrService(fastify.log, clientConfig) : null,
    )
  },
  {
    name: 'sonarr',
    dependencies: ['config'],
  },
)
