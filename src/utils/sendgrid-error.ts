/**
 * Error model for every call that crosses the SendGrid boundary.
 *
 * Errors are built at the point of failure through the constructors below;
 * nothing here is a shared instance. `kind` is the field callers branch on,
 * the message is for humans.
 */

export const SendgridErrorKind = {
  /** A required local field was missing; the network was never touched */
  Precondition: 'precondition',
  /** The request could not complete (DNS, refused, reset, timeout) */
  Transport: 'transport',
  /** The API answered with a non-success status other than 429 */
  Remote: 'remote',
  /** The API answered 429; the only kind the retry loop re-attempts */
  RateLimited: 'rate-limited',
  /** A success response whose body did not have the expected shape */
  Decode: 'decode',
  /** The retry budget ran out while still rate limited */
  Timeout: 'timeout',
  /** The caller's signal aborted the operation */
  Cancelled: 'cancelled',
  /** An entity required by import/update no longer exists */
  NotFound: 'not-found',
} as const

export type SendgridErrorKind =
  (typeof SendgridErrorKind)[keyof typeof SendgridErrorKind]

const INTERNAL_STATUS = 500

export interface SendgridErrorDetails {
  kind: SendgridErrorKind
  operation: string
  statusCode: number
  identifier?: string
  responseBody?: string
  retryAfterMs?: number
  cause?: unknown
}

export class SendgridRequestError extends Error {
  readonly kind: SendgridErrorKind
  readonly operation: string
  readonly statusCode: number
  readonly identifier?: string
  readonly responseBody?: string
  readonly retryAfterMs?: number

  constructor(message: string, details: SendgridErrorDetails) {
    super(message, { cause: details.cause })
    this.name = 'SendgridRequestError'
    this.kind = details.kind
    this.operation = details.operation
    this.statusCode = details.statusCode
    this.identifier = details.identifier
    this.responseBody = details.responseBody
    this.retryAfterMs = details.retryAfterMs

    Object.setPrototypeOf(this, new.target.prototype)

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, SendgridRequestError)
    }
  }
}

export function isSendgridError(err: unknown): err is SendgridRequestError {
  return err instanceof SendgridRequestError
}

export function isRateLimited(err: unknown): boolean {
  return isSendgridError(err) && err.kind === SendgridErrorKind.RateLimited
}

function describeTarget(operation: string, identifier?: string): string {
  return identifier ? `${operation} (${identifier})` : operation
}

export function preconditionError(
  operation: string,
  message: string,
): SendgridRequestError {
  return new SendgridRequestError(message, {
    kind: SendgridErrorKind.Precondition,
    operation,
    statusCode: INTERNAL_STATUS,
  })
}

export function transportError(
  operation: string,
  cause: unknown,
  identifier?: string,
): SendgridRequestError {
  const hint =
    cause instanceof Error ? mapConnectionErrorToMessage(cause) : String(cause)
  return new SendgridRequestError(
    `failed ${describeTarget(operation, identifier)}: ${hint}`,
    {
      kind: SendgridErrorKind.Transport,
      operation,
      identifier,
      statusCode: INTERNAL_STATUS,
      cause,
    },
  )
}

export function remoteRejection(
  operation: string,
  statusCode: number,
  responseBody: string,
  identifier?: string,
  retryAfterMs?: number,
): SendgridRequestError {
  const summary = parseSendgridErrorMessage(responseBody)
  const kind =
    statusCode === 429 ? SendgridErrorKind.RateLimited : SendgridErrorKind.Remote
  const detail = summary ? ` (${summary})` : ''
  return new SendgridRequestError(
    `failed ${describeTarget(operation, identifier)}, status: ${statusCode}, response: ${responseBody}${detail}`,
    {
      kind,
      operation,
      identifier,
      statusCode,
      responseBody,
      retryAfterMs,
    },
  )
}

export function decodeError(
  operation: string,
  responseBody: string,
  cause: unknown,
  identifier?: string,
): SendgridRequestError {
  const reason = cause instanceof Error ? cause.message : String(cause)
  return new SendgridRequestError(
    `failed parsing response of ${describeTarget(operation, identifier)}: ${reason}`,
    {
      kind: SendgridErrorKind.Decode,
      operation,
      identifier,
      statusCode: INTERNAL_STATUS,
      responseBody,
      cause,
    },
  )
}

export function timeoutError(
  operation: string,
  budgetMs: number,
  attempts: number,
  lastError?: SendgridRequestError,
): SendgridRequestError {
  return new SendgridRequestError(
    `${operation} still rate limited after ${attempts} attempt(s) within ${budgetMs}ms`,
    {
      kind: SendgridErrorKind.Timeout,
      operation,
      identifier: lastError?.identifier,
      statusCode: lastError?.statusCode ?? 429,
      responseBody: lastError?.responseBody,
      cause: lastError,
    },
  )
}

export function cancelledError(
  operation: string,
  attempts: number,
  reason?: unknown,
): SendgridRequestError {
  return new SendgridRequestError(
    `${operation} cancelled after ${attempts} attempt(s)`,
    {
      kind: SendgridErrorKind.Cancelled,
      operation,
      statusCode: INTERNAL_STATUS,
      cause: reason,
    },
  )
}

export function notFoundError(
  operation: string,
  identifier: string,
): SendgridRequestError {
  return new SendgridRequestError(
    `${operation}: ${identifier} wasn't found`,
    {
      kind: SendgridErrorKind.NotFound,
      operation,
      identifier,
      statusCode: 404,
    },
  )
}

/**
 * Turns low-level fetch failures into something a human can act on.
 * Prefers undici cause codes when present.
 */
export function mapConnectionErrorToMessage(error: Error): string {
  const code =
    typeof error.cause === 'object' &&
    error.cause !== null &&
    'code' in error.cause &&
    typeof error.cause.code === 'string'
      ? error.cause.code
      : undefined
  if (
    error.name === 'AbortError' ||
    error.name === 'TimeoutError' ||
    code === 'ABORT_ERR'
  ) {
    return 'request timed out or was aborted'
  }
  if (code === 'ECONNREFUSED' || error.message.includes('ECONNREFUSED')) {
    return 'connection refused'
  }
  if (code === 'ENOTFOUND' || error.message.includes('ENOTFOUND')) {
    return 'host not found'
  }
  if (code === 'ETIMEDOUT' || error.message.includes('ETIMEDOUT')) {
    return 'connection timed out'
  }
  if (code === 'ECONNRESET' || error.message.includes('ECONNRESET')) {
    return 'connection was reset'
  }
  return error.message || 'network error'
}

interface SendgridErrorEntry {
  field?: string | null
  message?: string
}

function isErrorEntry(value: unknown): value is SendgridErrorEntry {
  return typeof value === 'object' && value !== null
}

/**
 * Extracts a readable summary from a SendGrid error body.
 * Handles `{ errors: [{ field, message }] }` and `{ message }`; anything
 * else yields an empty string and the raw body carries the detail.
 */
export function parseSendgridErrorMessage(responseBody: string): string {
  if (!responseBody) return ''

  let data: unknown
  try {
    data = JSON.parse(responseBody)
  } catch {
    return ''
  }

  if (typeof data !== 'object' || data === null) return ''

  if ('errors' in data && Array.isArray(data.errors)) {
    return data.errors
      .filter(isErrorEntry)
      .map((e) =>
        e.field && e.message ? `${e.field}: ${e.message}` : (e.message ?? ''),
      )
      .filter(Boolean)
      .join('; ')
  }

  if ('message' in data && typeof data.message === 'string') {
    return data.message
  }

  return ''
}
