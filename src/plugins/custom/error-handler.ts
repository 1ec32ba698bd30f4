import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import {
  isSendgridError,
  SendgridErrorKind,
  type SendgridRequestError,
} from '@utils/sendgrid-error.js'
import type { FastifyError, FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

interface MappedError {
  statusCode: number
  code: string
  error: string
}

const SENDGRID_ERROR_MAP: Record<SendgridErrorKind, MappedError> = {
  [SendgridErrorKind.Precondition]: {
    statusCode: 400,
    code: 'SENDGRID_PRECONDITION_FAILED',
    error: 'Bad Request',
  },
  [SendgridErrorKind.NotFound]: {
    statusCode: 404,
    code: 'SENDGRID_NOT_FOUND',
    error: 'Not Found',
  },
  [SendgridErrorKind.Remote]: {
    statusCode: 502,
    code: 'SENDGRID_REMOTE_REJECTION',
    error: 'Bad Gateway',
  },
  [SendgridErrorKind.Transport]: {
    statusCode: 502,
    code: 'SENDGRID_TRANSPORT_ERROR',
    error: 'Bad Gateway',
  },
  [SendgridErrorKind.Decode]: {
    statusCode: 502,
    code: 'SENDGRID_DECODE_ERROR',
    error: 'Bad Gateway',
  },
  [SendgridErrorKind.RateLimited]: {
    statusCode: 503,
    code: 'SENDGRID_RATE_LIMITED',
    error: 'Service Unavailable',
  },
  [SendgridErrorKind.Timeout]: {
    statusCode: 503,
    code: 'SENDGRID_RETRY_TIMEOUT',
    error: 'Service Unavailable',
  },
  [SendgridErrorKind.Cancelled]: {
    statusCode: 503,
    code: 'SENDGRID_CANCELLED',
    error: 'Service Unavailable',
  },
}

/**
 * Translates a SendGrid failure into the host-facing response. The message
 * is passed through untouched since it names the operation, the
 * identifier and the remote answer.
 */
export function toErrorResponse(err: SendgridRequestError): ErrorResponse {
  const mapped = SENDGRID_ERROR_MAP[err.kind]
  return {
    statusCode: mapped.statusCode,
    code: mapped.code,
    error: mapped.error,
    message: err.message,
  }
}

/**
 * Global error handler plugin.
 * Provides consistent error responses and appropriate logging.
 */
async function errorHandler(fastify: FastifyInstance) {
  fastify.setErrorHandler((err: FastifyError, request, reply) => {
    const requestData = {
      id: request.id,
      method: request.method,
      path: request.url.split('?')[0],
      route: request.routeOptions?.url,
    }

    // Routes log these with their own context before rethrowing
    if (isSendgridError(err)) {
      const payload = toErrorResponse(err)
      request.log.debug(
        { kind: err.kind, request: requestData },
        'Responding with SendGrid failure',
      )
      reply.code(payload.statusCode)
      if (err.retryAfterMs !== undefined && payload.statusCode === 503) {
        reply.header('Retry-After', Math.ceil(err.retryAfterMs / 1000))
      }
      return payload
    }

    const statusCode = err.statusCode ?? 500
    // Avoid logging query/params to prevent leaking tokens/PII
    const logData = { err, request: requestData }

    if (statusCode >= 500) {
      request.log.error(logData, 'Internal server error occurred')
    } else {
      request.log.warn(logData, 'Client error occurred')
    }
    reply.code(statusCode)
    const isServerError = statusCode >= 500
    const payload: ErrorResponse = {
      statusCode,
      code: err.code || 'GENERIC_ERROR',
      error: isServerError
        ? 'Internal Server Error'
        : 'error' in err && typeof err.error === 'string'
          ? err.error
          : 'Client Error',
      message: isServerError
        ? 'Internal Server Error'
        : err.message || 'An error occurred',
    }
    return payload
  })
}

export default fp(errorHandler, {
  name: 'error-handler',
})
