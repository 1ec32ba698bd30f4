import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import { isSendgridError, SendgridErrorKind } from './sendgrid-error.js'

export type RouteErrorLevel = 'error' | 'warn' | 'info'

export interface RouteErrorOptions {
  /** Log message; defaults to "Error in route METHOD url" */
  message?: string
  /** Extra fields merged into the log object */
  context?: Record<string, unknown>
  level?: RouteErrorLevel
  [key: string]: unknown
}

/**
 * Logs a failed route with the route signature and any extra context.
 */
export function logRouteError(
  log: FastifyBaseLogger,
  request: FastifyRequest,
  error: unknown,
  options: RouteErrorOptions = {},
): void {
  const { message, context, level = 'error', ...extra } = options
  const route = `${request.method} ${request.routeOptions?.url ?? request.url}`

  const logObject: Record<string, unknown> = {
    error,
    route,
    ...context,
    ...extra,
  }

  log[level](logObject, message ?? `Error in route ${route}`)
}

/**
 * Failures caused by the caller's input or by an entity that is simply gone
 * are worth a warning; everything else is an error.
 */
export function routeErrorLevel(error: unknown): RouteErrorLevel {
  if (!isSendgridError(error)) {
    return 'error'
  }
  switch (error.kind) {
    case SendgridErrorKind.Precondition:
    case SendgridErrorKind.NotFound:
    case SendgridErrorKind.Cancelled:
      return 'warn'
    default:
      return 'error'
  }
}
