import serviceApp, { options } from '@root/app.js'
import type { ConfigOverrides } from '@root/types/config.types.js'
import type { FastifyInstance } from 'fastify'
import Fastify from 'fastify'
import fp from 'fastify-plugin'
import type { TestContext } from 'vitest'

/**
 * Build a Fastify application instance for testing
 *
 * @param t - Optional Vitest test context for automatic cleanup
 * @param configOverrides - Config values merged over the test environment
 * @returns Fastify instance ready for testing
 */
export async function build(
  t?: TestContext,
  configOverrides: ConfigOverrides = {},
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: false, // Disable logging in tests
    // Match production AJV options from server.ts
    ...options,
  })

  // Register the main app
  await app.register(fp(serviceApp), { configOverrides })
  await app.ready()

  // Auto-close app after test if context provided
  if (t) {
    t.onTestFinished(async () => {
      await app.close()
    })
  }

  return app
}

/** Authorization header carrying the token from the global test setup. */
export const AUTH_HEADERS = { authorization: 'Bearer test-secret' }
