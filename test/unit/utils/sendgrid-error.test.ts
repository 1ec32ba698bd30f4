import {
  cancelledError,
  decodeError,
  isRateLimited,
  isSendgridError,
  mapConnectionErrorToMessage,
  notFoundError,
  parseSendgridErrorMessage,
  preconditionError,
  remoteRejection,
  SendgridErrorKind,
  SendgridRequestError,
  timeoutError,
  transportError,
} from '@utils/sendgrid-error.js'
import { describe, expect, it } from 'vitest'

describe('sendgrid-error', () => {
  describe('SendgridRequestError', () => {
    it('should be an Error carrying kind, operation and status', () => {
      const error = preconditionError('creating subuser', 'username is required')

      expect(error).toBeInstanceOf(Error)
      expect(error).toBeInstanceOf(SendgridRequestError)
      expect(error.name).toBe('SendgridRequestError')
      expect(error.message).toBe('username is required')
      expect(error.kind).toBe(SendgridErrorKind.Precondition)
      expect(error.operation).toBe('creating subuser')
      expect(error.statusCode).toBe(500)
    })

    it('should build a new instance on every call', () => {
      const first = preconditionError('creating API key', 'name is required')
      const second = preconditionError('creating API key', 'name is required')

      expect(first).not.toBe(second)
    })
  })

  describe('isSendgridError / isRateLimited', () => {
    it('should only recognize SendgridRequestError instances', () => {
      expect(isSendgridError(new Error('plain'))).toBe(false)
      expect(isSendgridError('text')).toBe(false)
      expect(isSendgridError(notFoundError('importing subuser', 'bob'))).toBe(
        true,
      )
    })

    it('should treat only 429 rejections as rate limited', () => {
      expect(isRateLimited(remoteRejection('creating subuser', 429, ''))).toBe(
        true,
      )
      expect(isRateLimited(remoteRejection('creating subuser', 503, ''))).toBe(
        false,
      )
      expect(isRateLimited(new Error('429'))).toBe(false)
    })
  })

  describe('remoteRejection', () => {
    it('should embed operation, identifier, status and raw body', () => {
      const body = '{"errors":[{"field":"username","message":"username exists"}]}'
      const error = remoteRejection('creating subuser', 400, body, 'alice')

      expect(error.kind).toBe(SendgridErrorKind.Remote)
      expect(error.statusCode).toBe(400)
      expect(error.identifier).toBe('alice')
      expect(error.responseBody).toBe(body)
      expect(error.message).toBe(
        `failed creating subuser (alice), status: 400, response: ${body} (username: username exists)`,
      )
    })

    it('should mark 429 as rate limited and keep the Retry-After hint', () => {
      const error = remoteRejection('deleting subuser', 429, '', 'alice', 3000)

      expect(error.kind).toBe(SendgridErrorKind.RateLimited)
      expect(error.retryAfterMs).toBe(3000)
      expect(error.message).toBe(
        'failed deleting subuser (alice), status: 429, response: ',
      )
    })
  })

  describe('transportError', () => {
    it('should wrap the cause with the operation name', () => {
      const cause = new TypeError('fetch failed', {
        cause: Object.assign(new Error('getaddrinfo'), { code: 'ENOTFOUND' }),
      })
      const error = transportError('reading API key', cause, 'key-1')

      expect(error.kind).toBe(SendgridErrorKind.Transport)
      expect(error.statusCode).toBe(500)
      expect(error.cause).toBe(cause)
      expect(error.message).toBe('failed reading API key (key-1): host not found')
    })

    it('should describe non-Error causes as text', () => {
      const error = transportError('reading subuser', 'socket hang up')

      expect(error.message).toBe('failed reading subuser: socket hang up')
    })
  })

  describe('decodeError', () => {
    it('should be an internal error regardless of the remote status', () => {
      const cause = new SyntaxError('Unexpected token')
      const error = decodeError('creating API key', 'not json', cause, 'deploy')

      expect(error.kind).toBe(SendgridErrorKind.Decode)
      expect(error.statusCode).toBe(500)
      expect(error.responseBody).toBe('not json')
      expect(error.message).toBe(
        'failed parsing response of creating API key (deploy): Unexpected token',
      )
    })
  })

  describe('timeoutError', () => {
    it('should keep the last rate limit error as cause', () => {
      const last = remoteRejection('creating subuser', 429, 'slow down', 'alice')
      const error = timeoutError('creating subuser', 1000, 4, last)

      expect(error.kind).toBe(SendgridErrorKind.Timeout)
      expect(error.cause).toBe(last)
      expect(error.statusCode).toBe(429)
      expect(error.identifier).toBe('alice')
      expect(error.responseBody).toBe('slow down')
      expect(error.message).toBe(
        'creating subuser still rate limited after 4 attempt(s) within 1000ms',
      )
    })
  })

  describe('cancelledError / notFoundError', () => {
    it('should report how many attempts ran before cancellation', () => {
      const error = cancelledError('deleting API key', 2, 'shutdown')

      expect(error.kind).toBe(SendgridErrorKind.Cancelled)
      expect(error.cause).toBe('shutdown')
      expect(error.message).toBe('deleting API key cancelled after 2 attempt(s)')
    })

    it('should name the missing identifier', () => {
      const error = notFoundError('importing subuser', 'ghost')

      expect(error.kind).toBe(SendgridErrorKind.NotFound)
      expect(error.statusCode).toBe(404)
      expect(error.identifier).toBe('ghost')
      expect(error.message).toBe("importing subuser: ghost wasn't found")
    })
  })

  describe('mapConnectionErrorToMessage', () => {
    const withCode = (code: string) =>
      new TypeError('fetch failed', {
        cause: Object.assign(new Error(code), { code }),
      })

    it('should map undici cause codes to readable hints', () => {
      expect(mapConnectionErrorToMessage(withCode('ECONNREFUSED'))).toBe(
        'connection refused',
      )
      expect(mapConnectionErrorToMessage(withCode('ETIMEDOUT'))).toBe(
        'connection timed out',
      )
      expect(mapConnectionErrorToMessage(withCode('ECONNRESET'))).toBe(
        'connection was reset',
      )
    })

    it('should recognize aborted and timed out requests', () => {
      const timeout = new DOMException('The operation timed out', 'TimeoutError')

      expect(mapConnectionErrorToMessage(timeout)).toBe(
        'request timed out or was aborted',
      )
    })

    it('should fall back to the error message', () => {
      expect(mapConnectionErrorToMessage(new Error('boom'))).toBe('boom')
      expect(mapConnectionErrorToMessage(new Error(''))).toBe('network error')
    })
  })

  describe('parseSendgridErrorMessage', () => {
    it('should join field errors with semicolons', () => {
      const body = JSON.stringify({
        errors: [
          { field: 'username', message: 'username exists' },
          { field: null, message: 'ips are invalid' },
        ],
      })

      expect(parseSendgridErrorMessage(body)).toBe(
        'username: username exists; ips are invalid',
      )
    })

    it('should read a top-level message', () => {
      expect(parseSendgridErrorMessage('{"message":"access forbidden"}')).toBe(
        'access forbidden',
      )
    })

    it('should return an empty string for unparseable bodies', () => {
      expect(parseSendgridErrorMessage('')).toBe('')
      expect(parseSendgridErrorMessage('<html>bad gateway</html>')).toBe('')
      expect(parseSendgridErrorMessage('[1,2]')).toBe('')
    })
  })
})
