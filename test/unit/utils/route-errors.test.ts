import { logRouteError } from '@utils/route-errors.js'
import type { FastifyRequest } from 'fastify'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('route-errors', () => {
  describe('logRouteError', () => {
    it('should log error with default message and route', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/api/test?detailed=true',
        routeOptions: { url: '/api/test' },
      } as unknown as FastifyRequest

      const error = new Error('Test error')

      logRouteError(mockLogger, mockRequest, error)

      expect(mockLogger.error).toHaveBeenCalledWith(
        { error, route: 'GET /api/test' },
        'Error in route GET /api/test',
      )
    })

    it('should fall back to the raw url without route options', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/api/unknown',
      } as unknown as FastifyRequest

      logRouteError(mockLogger, mockRequest, new Error('x'))

      expect(mockLogger.error).toHaveBeenCalledWith(
        expect.objectContaining({ route: 'GET /api/unknown' }),
        'Error in route GET /api/unknown',
      )
    })

    it('should use custom message and merge context', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'POST',
        url: '/api/upgrade-item',
        routeOptions: { url: '/api/upgrade-item' },
      } as unknown as FastifyRequest

      const error = new Error('Test error')

      logRouteError(mockLogger, mockRequest, error, {
        message: 'Failed to upgrade item',
        context: { target: 'movies', id: 12 },
      })

      expect(mockLogger.error).toHaveBeenCalledWith(
        {
          error,
          route: 'POST /api/upgrade-item',
          target: 'movies',
          id: 12,
        },
        'Failed to upgrade item',
      )
    })

    it('should log at warn level and keep extra fields', () => {
      const mockLogger = createMockLogger()

      const mockRequest = {
        method: 'GET',
        url: '/api/events',
        routeOptions: { url: '/api/events' },
      } as unknown as FastifyRequest

      const error = new Error('stream closed')

      logRouteError(mockLogger, mockRequest, error, {
        level: 'warn',
        message: 'SSE stream error',
        connectionId: 'conn-1',
      })

      expect(mockLogger.warn).toHaveBeenCalledWith(
        { error, route: 'GET /api/events', connectionId: 'conn-1' },
        'SSE stream error',
      )
      expect(mockLogger.error).not.toHaveBeenCalled()
    })
  })
})
