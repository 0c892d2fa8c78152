import { STATUS_CODES } from 'node:http'
import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import { errorName } from '@utils/errors.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

// Access-control rejections and run conflicts are not worth a stream event
const UNPUBLISHED_STATUS_CODES = new Set([401, 403, 404, 409, 503])

/**
 * Global error handler plugin.
 * Provides consistent error responses and appropriate logging, and mirrors
 * request failures onto the progress stream as `error` events.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const statusCode = err.statusCode ?? 500
    // Avoid logging query/params to prevent leaking tokens/PII
    const logData = {
      err,
      request: {
        id: request.id,
        method: request.method,
        path: request.url.split('?')[0],
        route: request.routeOptions?.url,
      },
    }

    // Use appropriate log level based on status code
    if (statusCode === 401 || statusCode === 403) {
      request.log.warn(logData, 'Access denied')
    } else if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }

    if (!UNPUBLISHED_STATUS_CODES.has(statusCode)) {
      fastify.progress.publish(
        'error',
        `${errorName(err)}: ${err.message || 'An error occurred'}`,
      )
    }

    reply.code(statusCode)
    const isServerError = statusCode >= 500 && statusCode !== 503
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isServerError
        ? 'Internal Server Error'
        : (STATUS_CODES[statusCode] ?? 'Client Error'),
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
  dependencies: ['progress'],
})
