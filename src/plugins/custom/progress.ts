import { ProgressService } from '@services/event-emitter.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    progress: ProgressService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const progress = new ProgressService(fastify.log)
    fastify.decorate('progress', progress)

    fastify.addHook('onClose', async () => {
      if (progress.hasActiveConnections()) {
        fastify.log.info('Closing with progress streams still attached')
      }
    })
  },
  {
    name: 'progress',
    dependencies: ['sse'],
  },
)
