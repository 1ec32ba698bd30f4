import type { FastifyBaseLogger } from 'fastify'
import {
  type Attempt,
  type BackoffOptions,
  type RetrySuccess,
  retryWithBudget,
} from '../retry/retry-orchestrator.js'

export interface LifecycleOptions {
  /** Retry budget for create, in milliseconds */
  createTimeoutMs: number
  /** Retry budget for each scoped update write */
  updateTimeoutMs: number
  /** Retry budget for delete */
  deleteTimeoutMs: number
  backoff: BackoffOptions
  random?: () => number
}

/**
 * What a read tells the host: either the entity's current state, or that it
 * is gone and should be dropped from desired state.
 */
export type ReadOutcome<S> =
  | { status: 'present'; state: S }
  | { status: 'gone'; id: string }

/**
 * Runs a write attempt under the retry policy shared by every entity type.
 */
export function runWithRetry<C, T>(
  attempt: Attempt<C, T>,
  context: C,
  options: LifecycleOptions,
  run: {
    operation: string
    timeoutMs: number
    signal?: AbortSignal
    log: FastifyBaseLogger
  },
): Promise<RetrySuccess<T>> {
  return retryWithBudget(attempt, context, {
    ...options.backoff,
    random: options.random,
    ...run,
  })
}

/** Order-insensitive comparison for string sets (IPs, scopes) */
export function sameSet(a: readonly string[], b: readonly string[]): boolean {
  const left = new Set(a)
  const right = new Set(b)
  if (left.size !== right.size) return false
  for (const value of left) {
    if (!right.has(value)) return false
  }
  return true
}
