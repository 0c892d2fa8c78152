import type { FastifyBaseLogger, FastifyRequest } from 'fastify'

type RouteErrorLevel = 'error' | 'warn'

export interface RouteErrorOptions {
  message?: string
  level?: RouteErrorLevel
  context?: Record<string, unknown>
  [key: string]: unknown
}

/**
 * Logs a failure inside a route handler with the route it happened on.
 *
 * Extra keys besides `message`, `level` and `context` are merged into the
 * log object alongside `context`.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const { message, level = 'error', context, ...fields } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  log[level](
    {
      error,
      route,
      ...context,
      ...fields,
    },
    message ?? `Error in route ${route}`,
  )
}
