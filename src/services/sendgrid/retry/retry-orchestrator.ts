/**
 * Bounded-duration retry loop for SendGrid writes.
 *
 * An attempt is a plain function of an explicit context object that
 * reports a tagged outcome. Only `retryable` outcomes (rate limiting) are
 * re-attempted; the first `fatal` outcome ends the loop. The loop moves
 * between three states:
 *
 *   running ──retryable──▶ retry-pending ──delay elapsed──▶ running
 *      │                        │
 *      └─success / fatal──▶ done ◀──budget exhausted / aborted
 */

import type { RequestResult } from '@root/types/sendgrid-result.types.js'
import {
  cancelledError,
  isRateLimited,
  type SendgridRequestError,
  timeoutError,
} from '@utils/sendgrid-error.js'
import type { FastifyBaseLogger } from 'fastify'

export type AttemptOutcome<T> =
  | { kind: 'success'; value: T }
  | { kind: 'retryable'; error: SendgridRequestError }
  | { kind: 'fatal'; error: SendgridRequestError }

export type Attempt<C, T> = (
  context: C,
  signal?: AbortSignal,
) => Promise<AttemptOutcome<T>>

export type RetryState = 'running' | 'retry-pending' | 'done'

export interface BackoffOptions {
  initialDelayMs: number
  maxDelayMs: number
  multiplier: number
  /** 0.1 means ±10% */
  jitterRatio: number
}

export interface RetryOptions extends BackoffOptions {
  /** Used in logs and error messages, e.g. "creating subuser" */
  operation: string
  /** Overall budget for all attempts and waits */
  timeoutMs: number
  signal?: AbortSignal
  log?: FastifyBaseLogger
  /** Injectable for deterministic jitter */
  random?: () => number
}

export interface RetrySuccess<T> {
  value: T
  attempts: number
}

/**
 * Rate limiting is the one retryable failure; every other error is fatal.
 */
export function classifyResult<T>(result: RequestResult<T>): AttemptOutcome<T> {
  if (result.ok) {
    return { kind: 'success', value: result.value }
  }
  if (isRateLimited(result.error)) {
    return { kind: 'retryable', error: result.error }
  }
  return { kind: 'fatal', error: result.error }
}

/**
 * Delay before the next attempt after `failures` consecutive rate limits.
 * A Retry-After hint replaces the exponential base. Both are capped at
 * `maxDelayMs` before jitter is applied.
 */
export function computeBackoffDelay(
  failures: number,
  options: BackoffOptions,
  retryAfterMs?: number,
  random: () => number = Math.random,
): number {
  const exponential =
    options.initialDelayMs * options.multiplier ** Math.max(failures - 1, 0)
  const base = Math.min(retryAfterMs ?? exponential, options.maxDelayMs)
  const jitter = base * options.jitterRatio
  return Math.max(Math.round(base + (random() * 2 - 1) * jitter), 0)
}

/**
 * Resolves true once `ms` elapsed, false as soon as the signal aborts.
 */
function waitFor(ms: number, signal?: AbortSignal): Promise<boolean> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve(false)
      return
    }
    const onAbort = () => {
      clearTimeout(timer)
      resolve(false)
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve(true)
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

/**
 * Runs `attempt` until it succeeds, fails fatally, the budget runs out, or
 * the signal aborts. Throws the fatal error, a `timeout` error (cause: the
 * last rate-limit error) or a `cancelled` error.
 */
export async function retryWithBudget<C, T>(
  attempt: Attempt<C, T>,
  context: C,
  options: RetryOptions,
): Promise<RetrySuccess<T>> {
  const { operation, timeoutMs, signal, log } = options
  const random = options.random ?? Math.random
  const deadline = Date.now() + timeoutMs
  let attempts = 0
  let state: RetryState = 'running'

  const transition = (next: RetryState) => {
    log?.trace({ operation, from: state, to: next, attempts }, 'Retry state')
    state = next
  }

  while (true) {
    if (signal?.aborted) {
      transition('done')
      throw cancelledError(operation, attempts, signal.reason)
    }

    attempts++
    const outcome = await attempt(context, signal)

    if (outcome.kind === 'success') {
      transition('done')
      if (attempts > 1) {
        log?.info(`${operation} succeeded after ${attempts} attempts`)
      }
      return { value: outcome.value, attempts }
    }

    // A request cut short by the caller surfaces as a transport failure
    if (signal?.aborted) {
      transition('done')
      throw cancelledError(operation, attempts, signal.reason)
    }

    if (outcome.kind === 'fatal') {
      transition('done')
      throw outcome.error
    }

    const delay = computeBackoffDelay(
      attempts,
      options,
      outcome.error.retryAfterMs,
      random,
    )
    const remaining = deadline - Date.now()
    if (delay > remaining) {
      transition('done')
      log?.warn(
        `${operation} still rate limited after ${attempts} attempt(s), retry budget of ${timeoutMs}ms exhausted`,
      )
      throw timeoutError(operation, timeoutMs, attempts, outcome.error)
    }

    transition('retry-pending')
    log?.warn(
      `${operation} rate limited (429), retrying after ${delay}ms (attempt ${attempts})`,
    )

    const elapsed = await waitFor(delay, signal)
    if (!elapsed) {
      transition('done')
      throw cancelledError(operation, attempts, signal?.reason)
    }
    transition('running')
  }
}
