import type { HttpMethod } from '@root/types/sendgrid.types.js'
import type { TransportResponse } from '@root/types/sendgrid-result.types.js'
import type { FastifyBaseLogger } from 'fastify'

/**
 * The only thing the resource operations know about HTTP.
 * Implementations never throw: a request that could not complete comes
 * back with `error` set.
 */
export interface SendgridTransport {
  issueRequest(
    method: HttpMethod,
    path: string,
    body?: unknown,
    signal?: AbortSignal,
  ): Promise<TransportResponse>
}

export interface HttpTransportOptions {
  baseUrl: string
  apiKey: string
  /** Per-request timeout in milliseconds */
  timeoutMs: number
}

const USER_AGENT = 'sendgrid-reconciler/1.0'

/**
 * Parses a Retry-After header (delta-seconds or HTTP date) into
 * milliseconds. Returns undefined for anything unusable.
 */
export function parseRetryAfter(
  value: string | null,
  now = Date.now(),
): number | undefined {
  if (!value) return undefined

  const seconds = Number(value)
  if (Number.isFinite(seconds)) {
    return seconds >= 0 ? seconds * 1000 : undefined
  }

  const date = Date.parse(value)
  if (Number.isNaN(date)) return undefined
  return Math.max(date - now, 0)
}

/**
 * fetch-backed transport. Connection reuse is left to Node's global
 * dispatcher, which is safe to share across concurrent calls.
 */
export class HttpTransport implements SendgridTransport {
  private readonly baseUrl: string

  constructor(
    private readonly options: HttpTransportOptions,
    private readonly log: FastifyBaseLogger,
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '')
  }

  async issueRequest(
    method: HttpMethod,
    path: string,
    body?: unknown,
    signal?: AbortSignal,
  ): Promise<TransportResponse> {
    const url = `${this.baseUrl}${path.startsWith('/') ? path : `/${path}`}`
    const timeout = AbortSignal.timeout(this.options.timeoutMs)
    const headers: Record<string, string> = {
      Authorization: `Bearer ${this.options.apiKey}`,
      Accept: 'application/json',
      'User-Agent': USER_AGENT,
    }
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json'
    }

    try {
      const response = await fetch(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: signal ? AbortSignal.any([signal, timeout]) : timeout,
      })
      const text = await response.text()

      this.log.debug(
        { method, path, statusCode: response.status },
        'SendGrid request completed',
      )

      return {
        body: text,
        statusCode: response.status,
        retryAfterMs: parseRetryAfter(response.headers.get('retry-after')),
      }
    } catch (error) {
      this.log.debug({ method, path, error }, 'SendGrid request failed')
      return {
        body: '',
        statusCode: 0,
        error: error instanceof Error ? error : new Error(String(error)),
      }
    }
  }
}
