import {
  failed,
  type RequestResult,
  succeeded,
  type TransportResponse,
} from '@root/types/sendgrid-result.types.js'
import {
  decodeError,
  remoteRejection,
  transportError,
} from '@utils/sendgrid-error.js'
import type { z } from 'zod'

/**
 * Maps a transport failure or a non-success status to a failed result.
 * Returns null when the response is a success the caller should decode.
 */
export function rejectFailure<T>(
  operation: string,
  response: TransportResponse,
  identifier?: string,
): RequestResult<T> | null {
  if (response.error) {
    return failed(transportError(operation, response.error, identifier))
  }

  if (response.statusCode >= 300) {
    return failed(
      remoteRejection(
        operation,
        response.statusCode,
        response.body,
        identifier,
        response.retryAfterMs,
      ),
    )
  }

  return null
}

/**
 * Parses and validates a success body. A body that does not match is an
 * internal (500) decode failure, never the remote's 2xx status.
 */
export function decodeBody<S extends z.ZodType, T>(
  operation: string,
  response: TransportResponse,
  schema: S,
  map: (wire: z.output<S>) => T,
  identifier?: string,
): RequestResult<T> {
  let json: unknown
  try {
    json = JSON.parse(response.body)
  } catch (err) {
    return failed(decodeError(operation, response.body, err, identifier))
  }

  const parsed = schema.safeParse(json)
  if (!parsed.success) {
    return failed(
      decodeError(operation, response.body, parsed.error, identifier),
    )
  }

  return succeeded(map(parsed.data), response.statusCode)
}

/**
 * Full pipeline for a request that answers with a body.
 */
export function interpretResponse<S extends z.ZodType, T>(
  operation: string,
  response: TransportResponse,
  schema: S,
  map: (wire: z.output<S>) => T,
  identifier?: string,
): RequestResult<T> {
  return (
    rejectFailure<T>(operation, response, identifier) ??
    decodeBody(operation, response, schema, map, identifier)
  )
}

/** Drops `undefined`, empty strings and empty arrays from a write body */
export function omitEmpty<T extends object>(fields: T): Partial<T> {
  const body: Partial<T> = {}
  for (const key of Object.keys(fields) as Array<keyof T>) {
    const value = fields[key]
    if (value === undefined || value === null) continue
    if (typeof value === 'string' && value === '') continue
    if (Array.isArray(value) && value.length === 0) continue
    body[key] = value
  }
  return body
}
