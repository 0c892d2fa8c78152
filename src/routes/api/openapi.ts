import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/openapi.json',
    {
      schema: {
        hide: true,
      },
    },
    async () => {
      return fastify.swagger()
    },
  )
}

export default plugin
