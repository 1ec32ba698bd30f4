import type { SendgridRequestError } from '@utils/sendgrid-error.js'

/**
 * Outcome of a single remote operation. A failure always carries an error;
 * a success never does, and its status code is below 300.
 */
export type RequestResult<T> =
  | { ok: true; statusCode: number; value: T }
  | { ok: false; statusCode: number; error: SendgridRequestError }

/** Result of a read: not finding the entity is a value, not an error */
export type Lookup<T> = { found: true; entity: T } | { found: false }

/**
 * Successful delete. `already-absent` is reported as 204 so that every ok
 * result keeps a status below 300.
 */
export type DeleteOutcome = 'deleted' | 'already-absent'

/** Raw answer of the transport boundary */
export interface TransportResponse {
  body: string
  statusCode: number
  /** Set when the request itself could not complete */
  error?: Error
  /** Parsed Retry-After header, when the API sent one */
  retryAfterMs?: number
}

export function succeeded<T>(value: T, statusCode = 200): RequestResult<T> {
  return { ok: true, statusCode, value }
}

export function failed<T>(error: SendgridRequestError): RequestResult<T> {
  return { ok: false, statusCode: error.statusCode, error }
}
