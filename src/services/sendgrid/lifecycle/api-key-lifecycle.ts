import type {
  ApiKey,
  ApiKeyChanges,
  ApiKeyCreateInput,
} from '@root/types/sendgrid.types.js'
import type { DeleteOutcome } from '@root/types/sendgrid-result.types.js'
import { notFoundError } from '@utils/sendgrid-error.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  createApiKey,
  deleteApiKey,
  readApiKey,
  updateApiKey,
} from '../operations/api-keys.js'
import { type Attempt, classifyResult } from '../retry/retry-orchestrator.js'
import type { SendgridTransport } from '../transport/http-transport.js'
import {
  type LifecycleOptions,
  type ReadOutcome,
  runWithRetry,
  sameSet,
} from './lifecycle-options.js'

export interface ApiKeyDesired {
  name: string
  scopes?: string[]
}

export interface ApiKeyState {
  id: string
  name: string
  scopes: string[]
  /** Secret returned once by create; carried forward from then on */
  apiKey?: string
}

interface WriteContext {
  transport: SendgridTransport
  id: string
}

const createAttempt: Attempt<
  { transport: SendgridTransport; input: ApiKeyCreateInput },
  ApiKey
> = async ({ transport, input }, signal) =>
  classifyResult(await createApiKey(transport, input, signal))

const updateAttempt: Attempt<
  WriteContext & { changes: ApiKeyChanges },
  ApiKey
> = async ({ transport, id, changes }, signal) =>
  classifyResult(await updateApiKey(transport, id, changes, signal))

const deleteAttempt: Attempt<WriteContext, DeleteOutcome> = async (
  { transport, id },
  signal,
) => classifyResult(await deleteApiKey(transport, id, signal))

export function toApiKeyState(
  entity: ApiKey,
  prior?: Partial<ApiKeyState>,
): ApiKeyState {
  return {
    id: entity.id,
    name: entity.name,
    scopes: entity.scopes,
    apiKey: entity.apiKey ?? prior?.apiKey,
  }
}

/**
 * Reconciles an API key. The local identifier is the remote-assigned id.
 */
export class ApiKeyLifecycle {
  constructor(
    private readonly transport: SendgridTransport,
    private readonly options: LifecycleOptions,
    private readonly log: FastifyBaseLogger,
  ) {}

  /**
   * Creates the key under retry and reads it back. The secret only ever
   * comes with the create answer, so once the key exists a failed read-back
   * returns the created state rather than losing it.
   */
  async create(
    desired: ApiKeyDesired,
    signal?: AbortSignal,
  ): Promise<ApiKeyState> {
    const { value: created, attempts } = await runWithRetry(
      createAttempt,
      {
        transport: this.transport,
        input: { name: desired.name, scopes: desired.scopes },
      },
      this.options,
      {
        operation: 'creating API key',
        timeoutMs: this.options.createTimeoutMs,
        signal,
        log: this.log,
      },
    )

    this.log.info(
      { id: created.id, name: created.name, attempts },
      'API key created',
    )

    const state = toApiKeyState(created)
    try {
      return await this.refresh(created.id, state, 'creating API key', signal)
    } catch (error) {
      this.log.warn(
        { error, id: created.id },
        'API key created but reading it back failed; returning the created state',
      )
      return state
    }
  }

  async read(
    id: string,
    prior?: ApiKeyState,
    signal?: AbortSignal,
  ): Promise<ReadOutcome<ApiKeyState>> {
    const result = await readApiKey(this.transport, id, signal)
    if (!result.ok) {
      throw result.error
    }

    if (!result.value.found) {
      this.log.warn({ id }, 'API key no longer exists')
      return { status: 'gone', id }
    }

    return {
      status: 'present',
      state: toApiKeyState(result.value.entity, prior),
    }
  }

  /**
   * Sends one PUT when the name or the scopes differ from `prior` and
   * returns the key as the PUT answered it. With nothing to change the key
   * is only read. An empty scope list means "leave scopes alone".
   */
  async update(
    id: string,
    prior: ApiKeyState,
    desired: ApiKeyDesired,
    signal?: AbortSignal,
  ): Promise<ApiKeyState> {
    const operation = 'updating API key'

    const nameChanged = desired.name !== prior.name
    const scopesChanged =
      desired.scopes !== undefined &&
      desired.scopes.length > 0 &&
      !sameSet(desired.scopes, prior.scopes)

    if (!nameChanged && !scopesChanged) {
      return this.refresh(id, prior, operation, signal)
    }

    // PUT rejects a body without a name, so it always goes along
    const changes: ApiKeyChanges = {
      name: desired.name,
      scopes: scopesChanged ? desired.scopes : undefined,
    }
    const { value: current } = await runWithRetry(
      updateAttempt,
      { transport: this.transport, id, changes },
      this.options,
      {
        operation,
        timeoutMs: this.options.updateTimeoutMs,
        signal,
        log: this.log,
      },
    )
    this.log.info({ id, nameChanged, scopesChanged }, 'API key updated')

    return toApiKeyState(current, prior)
  }

  async delete(id: string, signal?: AbortSignal): Promise<DeleteOutcome> {
    const { value } = await runWithRetry(
      deleteAttempt,
      { transport: this.transport, id },
      this.options,
      {
        operation: 'deleting API key',
        timeoutMs: this.options.deleteTimeoutMs,
        signal,
        log: this.log,
      },
    )

    if (value === 'already-absent') {
      this.log.debug({ id }, 'API key was already deleted')
    } else {
      this.log.info({ id }, 'API key deleted')
    }
    return value
  }

  async import(id: string, signal?: AbortSignal): Promise<ApiKeyState> {
    return this.refresh(id, undefined, 'importing API key', signal)
  }

  private async refresh(
    id: string,
    prior: ApiKeyState | undefined,
    operation: string,
    signal?: AbortSignal,
  ): Promise<ApiKeyState> {
    const outcome = await this.read(id, prior, signal)
    if (outcome.status === 'gone') {
      throw notFoundError(operation, id)
    }
    return outcome.state
  }
}
