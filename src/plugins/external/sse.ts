import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'
import { FastifySSEPlugin } from 'fastify-sse-v2'

/**
 * Server-sent events via `reply.sse(asyncIterable)`.
 *
 * @see {@link https://github.com/mpetrunic/fastify-sse-v2}
 */
export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(FastifySSEPlugin)
  },
  {
    name: 'sse',
  },
)
