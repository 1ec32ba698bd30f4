import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import {
  notFoundError,
  preconditionError,
  remoteRejection,
  timeoutError,
} from '@utils/sendgrid-error.js'
import type { FastifyRequest } from 'fastify'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

const requestFor = (method: string, url: string, routeUrl?: string) =>
  ({
    method,
    url,
    routeOptions: routeUrl ? { url: routeUrl } : undefined,
  }) as unknown as FastifyRequest

describe('route-errors', () => {
  describe('logRouteError', () => {
    it('should log error with default message and route pattern', () => {
      const mockLogger = createMockLogger()
      const error = new Error('Test error')

      logRouteError(
        mockLogger,
        requestFor('GET', '/v1/subusers/alice', '/v1/subusers/:username'),
        error,
      )

      expect(mockLogger.error).toHaveBeenCalledWith(
        { error, route: 'GET /v1/subusers/:username' },
        'Error in route GET /v1/subusers/:username',
      )
    })

    it('should use custom message and merge context', () => {
      const mockLogger = createMockLogger()
      const error = new Error('Test error')

      logRouteError(
        mockLogger,
        requestFor('POST', '/v1/subusers/', '/v1/subusers/'),
        error,
        {
          message: 'Failed to create subuser',
          context: { username: 'alice' },
          attempt: 2,
        },
      )

      expect(mockLogger.error).toHaveBeenCalledWith(
        {
          error,
          route: 'POST /v1/subusers/',
          username: 'alice',
          attempt: 2,
        },
        'Failed to create subuser',
      )
    })

    it('should use the requested level only', () => {
      const mockLogger = createMockLogger()

      logRouteError(mockLogger, requestFor('GET', '/x', '/x'), new Error('e'), {
        level: 'warn',
      })

      expect(mockLogger.warn).toHaveBeenCalledTimes(1)
      expect(mockLogger.error).not.toHaveBeenCalled()
      expect(mockLogger.info).not.toHaveBeenCalled()
    })

    it('should fall back to request.url when routeOptions is missing', () => {
      const mockLogger = createMockLogger()
      const error = new Error('Test error')

      logRouteError(mockLogger, requestFor('DELETE', '/v1/api-keys/k1'), error)

      expect(mockLogger.error).toHaveBeenCalledWith(
        { error, route: 'DELETE /v1/api-keys/k1' },
        'Error in route DELETE /v1/api-keys/k1',
      )
    })
  })

  describe('routeErrorLevel', () => {
    it('should warn for caller mistakes and vanished entities', () => {
      expect(
        routeErrorLevel(preconditionError('updating subuser', 'bad input')),
      ).toBe('warn')
      expect(routeErrorLevel(notFoundError('importing subuser', 'x'))).toBe(
        'warn',
      )
    })

    it('should report remote failures and unknown errors as errors', () => {
      expect(
        routeErrorLevel(remoteRejection('creating subuser', 500, 'oops')),
      ).toBe('error')
      expect(routeErrorLevel(timeoutError('creating subuser', 100, 3))).toBe(
        'error',
      )
      expect(routeErrorLevel(new Error('unexpected'))).toBe('error')
    })
  })
})
