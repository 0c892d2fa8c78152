import { randomUUID } from 'node:crypto'
import { ProgressStreamResponseSchema } from '@schemas/progress/progress.schema.js'
import { logRouteError } from '@utils/route-errors.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get(
    '/events',
    {
      schema: {
        summary: 'Stream progress events',
        operationId: 'streamProgressEvents',
        description:
          'Server-Sent Events stream of upgrade progress. Every subscriber receives every event published after it connected.',
        response: {
          200: ProgressStreamResponseSchema,
        },
        tags: ['Progress'],
      },
    },
    async (request, reply) => {
      const connectionId = randomUUID()
      const progressService = fastify.progress
      const abortController = new AbortController()

      progressService.addConnection(connectionId)

      request.socket.on('close', () => {
        progressService.removeConnection(connectionId)
        abortController.abort()
      })

      return reply.sse(
        (async function* source() {
          try {
            for await (const event of progressService.subscribe(
              abortController.signal,
            )) {
              yield {
                id: String(event.sequence),
                event: event.type,
                data: JSON.stringify(event),
              }
            }
          } catch (error) {
            logRouteError(fastify.log, request, error, {
              message: 'SSE stream error',
              connectionId,
            })
          }
        })(),
      )
    },
  )
}

export default plugin
