/**
 * Subuser operations against the SendGrid v3 API.
 *
 * A subuser is identified by the username the caller chose, so "read by
 * identifier" is a filtered list call. None of these functions throw: every
 * outcome, including a missing required field, is a RequestResult.
 */

import {
  type DecodedSubuserWire,
  SubuserListWireSchema,
  SubuserWireSchema,
} from '@root/schemas/sendgrid/wire.schema.js'
import type {
  Subuser,
  SubuserChanges,
  SubuserCreateInput,
  SubuserWire,
} from '@root/types/sendgrid.types.js'
import {
  type DeleteOutcome,
  failed,
  type Lookup,
  type RequestResult,
  succeeded,
} from '@root/types/sendgrid-result.types.js'
import { notFoundError, preconditionError } from '@utils/sendgrid-error.js'
import type { SendgridTransport } from '../transport/http-transport.js'
import {
  decodeBody,
  interpretResponse,
  omitEmpty,
  rejectFailure,
} from './response.js'

const subuserPath = (username: string) =>
  `/subusers/${encodeURIComponent(username)}`

export function toSubuser(wire: DecodedSubuserWire): Subuser {
  return {
    userId: wire.user_id ?? wire.id ?? 0,
    username: wire.username,
    email: wire.email,
    disabled: wire.disabled ?? false,
    ips: wire.ips,
    signupSessionToken: wire.signup_session_token,
    authorizationToken: wire.authorization_token,
    creditAllocationType: wire.credit_allocation?.type,
  }
}

/**
 * Creates a subuser. Only non-empty fields go on the wire.
 */
export async function createSubuser(
  transport: SendgridTransport,
  input: SubuserCreateInput,
  signal?: AbortSignal,
): Promise<RequestResult<Subuser>> {
  const operation = 'creating subuser'
  if (!input.username) {
    return failed(preconditionError(operation, 'username is required'))
  }
  if (!input.email) {
    return failed(preconditionError(operation, 'email is required'))
  }
  if (!input.password) {
    return failed(preconditionError(operation, 'password is required'))
  }

  const body = omitEmpty<SubuserWire>({
    username: input.username,
    email: input.email,
    password: input.password,
    ips: input.ips,
  })

  const response = await transport.issueRequest(
    'POST',
    '/subusers',
    body,
    signal,
  )

  return interpretResponse(
    operation,
    response,
    SubuserWireSchema,
    toSubuser,
    input.username,
  )
}

/**
 * Looks a subuser up by username. An empty match is `{ found: false }`.
 */
export async function readSubuser(
  transport: SendgridTransport,
  username: string,
  signal?: AbortSignal,
): Promise<RequestResult<Lookup<Subuser>>> {
  const operation = 'reading subuser'
  if (!username) {
    return failed(preconditionError(operation, 'username is required'))
  }

  const response = await transport.issueRequest(
    'GET',
    `/subusers?username=${encodeURIComponent(username)}`,
    undefined,
    signal,
  )

  return (
    rejectFailure<Lookup<Subuser>>(operation, response, username) ??
    decodeBody(
      operation,
      response,
      SubuserListWireSchema,
      (list): Lookup<Subuser> => {
        // The filter is a prefix match on some accounts; keep the exact one
        const match = list.find((wire) => wire.username === username)
        return match
          ? { found: true, entity: toSubuser(match) }
          : { found: false }
      },
      username,
    )
  )
}

/**
 * Applies scoped changes, one write per supplied field, then returns the
 * subuser as the API now reports it. An empty change set writes nothing.
 */
export async function updateSubuser(
  transport: SendgridTransport,
  username: string,
  changes: SubuserChanges,
  signal?: AbortSignal,
): Promise<RequestResult<Subuser>> {
  const operation = 'updating subuser'
  if (!username) {
    return failed(preconditionError(operation, 'username is required'))
  }

  const scoped = omitEmpty(changes)

  if (scoped.disabled !== undefined) {
    const response = await transport.issueRequest(
      'PATCH',
      subuserPath(username),
      { disabled: scoped.disabled },
      signal,
    )
    const rejected = rejectFailure<Subuser>(operation, response, username)
    if (rejected) return rejected
  }

  if (scoped.ips) {
    const response = await transport.issueRequest(
      'PUT',
      `${subuserPath(username)}/ips`,
      scoped.ips,
      signal,
    )
    const rejected = rejectFailure<Subuser>(operation, response, username)
    if (rejected) return rejected
  }

  // PATCH answers 204, so the fresh entity comes from a read
  const current = await readSubuser(transport, username, signal)
  if (!current.ok) return current
  if (!current.value.found) {
    return failed(notFoundError(operation, username))
  }
  return succeeded(current.value.entity, current.statusCode)
}

/**
 * Deletes a subuser. A 404 means it is already gone, which counts as
 * success so repeated deletes converge.
 */
export async function deleteSubuser(
  transport: SendgridTransport,
  username: string,
  signal?: AbortSignal,
): Promise<RequestResult<DeleteOutcome>> {
  const operation = 'deleting subuser'
  if (!username) {
    return failed(preconditionError(operation, 'username is required'))
  }

  const response = await transport.issueRequest(
    'DELETE',
    subuserPath(username),
    undefined,
    signal,
  )

  if (!response.error && response.statusCode === 404) {
    return succeeded<DeleteOutcome>('already-absent', 204)
  }

  return (
    rejectFailure<DeleteOutcome>(operation, response, username) ??
    succeeded<DeleteOutcome>('deleted', response.statusCode)
  )
}
