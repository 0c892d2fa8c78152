import closeWithGrace from 'close-with-grace'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import { createLoggerConfig } from '@utils/logger.js'
import serviceApp, { options } from './app.js'

/**
 * Starts the service: logger, plugins, routes, then the listener.
 *
 * Shutdown goes through close-with-grace; the engine plugin's onClose hook
 * lets an in-flight upgrade cycle finish before the process exits.
 */
async function init() {
  const app = Fastify({
    logger: createLoggerConfig(),
    ...options,
    // Honour X-Forwarded-For so the address allow-list sees the real caller
    trustProxy: process.env.trustProxy === 'true',
    pluginTimeout: 60000,
    // Force close persistent connections (like SSE) during shutdown
    forceCloseConnections: true,
  })

  await app.register(fp(serviceApp))
  await app.ready()

  app.log.level = app.config.logLevel

  closeWithGrace(
    {
      delay: app.config.closeGraceDelay,
    },
    async ({ err }) => {
      if (err != null) {
        app.log.error(err)
      }
      await app.close()
    },
  )

  await app.listen({
    port: app.config.port,
    host: '0.0.0.0',
  })
}

init().catch((err: unknown) => {
  console.error('Failed to start server:', err)
  process.exit(1)
})
