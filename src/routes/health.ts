import type { FastifyPluginAsync } from 'fastify'

// Plain text body, so no response schema: the zod serializer would quote it
const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/healthz',
    {
      schema: {
        summary: 'Liveness check',
        operationId: 'getHealth',
        description: 'Answers `ok` as text/plain while the process is up.',
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      return reply.type('text/plain').send('ok')
    },
  )
}

export default plugin
