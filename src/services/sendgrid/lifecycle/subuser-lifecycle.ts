import type {
  Subuser,
  SubuserChanges,
  SubuserCreateInput,
} from '@root/types/sendgrid.types.js'
import type { DeleteOutcome } from '@root/types/sendgrid-result.types.js'
import { notFoundError, preconditionError } from '@utils/sendgrid-error.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  createSubuser,
  deleteSubuser,
  readSubuser,
  updateSubuser,
} from '../operations/subusers.js'
import { type Attempt, classifyResult } from '../retry/retry-orchestrator.js'
import type { SendgridTransport } from '../transport/http-transport.js'
import {
  type LifecycleOptions,
  type ReadOutcome,
  runWithRetry,
  sameSet,
} from './lifecycle-options.js'

/** Desired state as declared by the host */
export interface SubuserDesired {
  username: string
  email: string
  password: string
  ips: string[]
  disabled?: boolean
}

/** Everything tracked locally for a subuser */
export interface SubuserState {
  username: string
  email: string
  password: string
  ips: string[]
  disabled: boolean
  userId: number
  signupSessionToken?: string
  authorizationToken?: string
  creditAllocationType?: string
}

interface WriteContext {
  transport: SendgridTransport
  username: string
}

const createAttempt: Attempt<
  { transport: SendgridTransport; input: SubuserCreateInput },
  Subuser
> = async ({ transport, input }, signal) =>
  classifyResult(await createSubuser(transport, input, signal))

const updateAttempt: Attempt<
  WriteContext & { changes: SubuserChanges },
  Subuser
> = async ({ transport, username, changes }, signal) =>
  classifyResult(await updateSubuser(transport, username, changes, signal))

const deleteAttempt: Attempt<WriteContext, DeleteOutcome> = async (
  { transport, username },
  signal,
) => classifyResult(await deleteSubuser(transport, username, signal))

/**
 * Builds local state from a decoded subuser. The API never echoes the
 * password and only some endpoints return IPs or tokens, so those fall
 * back to what was known before.
 */
export function toSubuserState(
  entity: Subuser,
  prior?: Partial<SubuserState>,
): SubuserState {
  return {
    username: entity.username,
    email: entity.email,
    disabled: entity.disabled,
    userId: entity.userId || prior?.userId || 0,
    password: prior?.password ?? '',
    ips: entity.ips ?? prior?.ips ?? [],
    signupSessionToken: entity.signupSessionToken ?? prior?.signupSessionToken,
    authorizationToken: entity.authorizationToken ?? prior?.authorizationToken,
    creditAllocationType:
      entity.creditAllocationType ?? prior?.creditAllocationType,
  }
}

/**
 * Reconciles a subuser with its declared state. The local identifier is
 * the username.
 */
export class SubuserLifecycle {
  constructor(
    private readonly transport: SendgridTransport,
    private readonly options: LifecycleOptions,
    private readonly log: FastifyBaseLogger,
  ) {}

  /**
   * Creates the subuser (retrying on 429), applies `disabled`, which the
   * create call cannot carry, and reads back the computed fields.
   *
   * Once the subuser exists, a failed follow-up no longer fails the create:
   * the state built from the create answer is returned instead, and the
   * next update converges `disabled`.
   */
  async create(
    desired: SubuserDesired,
    signal?: AbortSignal,
  ): Promise<SubuserState> {
    const { value: created, attempts } = await runWithRetry(
      createAttempt,
      {
        transport: this.transport,
        input: {
          username: desired.username,
          email: desired.email,
          password: desired.password,
          ips: desired.ips,
        },
      },
      this.options,
      {
        operation: 'creating subuser',
        timeoutMs: this.options.createTimeoutMs,
        signal,
        log: this.log,
      },
    )

    const username = created.username
    this.log.info(
      { username, userId: created.userId, attempts },
      'Subuser created',
    )

    const prior = toSubuserState(created, {
      password: desired.password,
      ips: desired.ips,
    })

    try {
      if (desired.disabled) {
        return await this.update(username, prior, desired, signal)
      }
      return await this.refresh(username, prior, 'creating subuser', signal)
    } catch (error) {
      this.log.warn(
        { error, username },
        'Subuser created but the follow-up failed; returning the created state',
      )
      return prior
    }
  }

  /**
   * Reads the subuser. `gone` means the host should forget it.
   */
  async read(
    username: string,
    prior?: SubuserState,
    signal?: AbortSignal,
  ): Promise<ReadOutcome<SubuserState>> {
    const result = await readSubuser(this.transport, username, signal)
    if (!result.ok) {
      throw result.error
    }

    if (!result.value.found) {
      this.log.warn({ username }, 'Subuser no longer exists')
      return { status: 'gone', id: username }
    }

    return {
      status: 'present',
      state: toSubuserState(result.value.entity, prior),
    }
  }

  /**
   * Writes every field that differs from `prior` (one scoped call each) and
   * returns the state read back after the writes. Username, email and
   * password cannot change in place.
   */
  async update(
    username: string,
    prior: SubuserState,
    desired: SubuserDesired,
    signal?: AbortSignal,
  ): Promise<SubuserState> {
    const operation = 'updating subuser'

    if (desired.username !== username) {
      throw preconditionError(
        operation,
        `username cannot change from ${username} to ${desired.username}; the subuser must be replaced`,
      )
    }
    if (desired.email !== prior.email) {
      throw preconditionError(
        operation,
        `email of ${username} cannot change in place; the subuser must be replaced`,
      )
    }
    // An imported subuser has no known password yet; adopt the declared one
    if (prior.password && desired.password !== prior.password) {
      throw preconditionError(
        operation,
        `password of ${username} cannot change in place; the subuser must be replaced`,
      )
    }

    const changes: SubuserChanges = {}
    // Left undeclared, `disabled` follows whatever the API reports
    if (desired.disabled !== undefined && desired.disabled !== prior.disabled) {
      changes.disabled = desired.disabled
    }
    if (desired.ips.length > 0 && !sameSet(desired.ips, prior.ips)) {
      changes.ips = desired.ips
    }

    const next: SubuserState = {
      ...prior,
      password: desired.password || prior.password,
      ips: desired.ips.length > 0 ? desired.ips : prior.ips,
    }

    const fields = Object.keys(changes)
    if (fields.length === 0) {
      return this.refresh(username, next, operation, signal)
    }

    // The scoped writes are idempotent, so a 429 on the second one may
    // safely repeat the first
    const { value: current } = await runWithRetry(
      updateAttempt,
      { transport: this.transport, username, changes },
      this.options,
      {
        operation,
        timeoutMs: this.options.updateTimeoutMs,
        signal,
        log: this.log,
      },
    )
    this.log.info({ username, fields }, 'Subuser updated')

    return toSubuserState(current, next)
  }

  /**
   * Deletes the subuser, retrying on 429. Deleting a subuser that is
   * already gone succeeds.
   */
  async delete(username: string, signal?: AbortSignal): Promise<DeleteOutcome> {
    const { value } = await runWithRetry(
      deleteAttempt,
      { transport: this.transport, username },
      this.options,
      {
        operation: 'deleting subuser',
        timeoutMs: this.options.deleteTimeoutMs,
        signal,
        log: this.log,
      },
    )

    if (value === 'already-absent') {
      this.log.debug({ username }, 'Subuser was already deleted')
    } else {
      this.log.info({ username }, 'Subuser deleted')
    }
    return value
  }

  /**
   * Adopts an existing subuser given only its username.
   */
  async import(username: string, signal?: AbortSignal): Promise<SubuserState> {
    return this.refresh(username, undefined, 'importing subuser', signal)
  }

  private async refresh(
    username: string,
    prior: SubuserState | undefined,
    operation: string,
    signal?: AbortSignal,
  ): Promise<SubuserState> {
    const outcome = await this.read(username, prior, signal)
    if (outcome.status === 'gone') {
      throw notFoundError(operation, username)
    }
    return outcome.state
  }
}
