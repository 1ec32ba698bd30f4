/**
 * API key operations. Unlike subusers, an API key is identified by the
 * `api_key_id` SendGrid assigns on creation.
 */

import {
  ApiKeyWireSchema,
  type DecodedApiKeyWire,
} from '@root/schemas/sendgrid/wire.schema.js'
import type {
  ApiKey,
  ApiKeyChanges,
  ApiKeyCreateInput,
  ApiKeyWire,
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

const API_KEY_ID_REQUIRED = 'api key id is required'

const apiKeyPath = (id: string) => `/api_keys/${encodeURIComponent(id)}`

export function toApiKey(wire: DecodedApiKeyWire): ApiKey {
  return {
    id: wire.api_key_id,
    name: wire.name,
    scopes: wire.scopes ?? [],
    apiKey: wire.api_key,
  }
}

export async function createApiKey(
  transport: SendgridTransport,
  input: ApiKeyCreateInput,
  signal?: AbortSignal,
): Promise<RequestResult<ApiKey>> {
  const operation = 'creating API key'
  if (!input.name) {
    return failed(preconditionError(operation, 'name is required'))
  }

  const response = await transport.issueRequest(
    'POST',
    '/api_keys',
    omitEmpty<ApiKeyWire>({ name: input.name, scopes: input.scopes }),
    signal,
  )

  return interpretResponse(
    operation,
    response,
    ApiKeyWireSchema,
    toApiKey,
    input.name,
  )
}

export async function readApiKey(
  transport: SendgridTransport,
  id: string,
  signal?: AbortSignal,
): Promise<RequestResult<Lookup<ApiKey>>> {
  const operation = 'reading API key'
  if (!id) {
    return failed(preconditionError(operation, API_KEY_ID_REQUIRED))
  }

  const response = await transport.issueRequest(
    'GET',
    apiKeyPath(id),
    undefined,
    signal,
  )

  if (!response.error && response.statusCode === 404) {
    return succeeded<Lookup<ApiKey>>({ found: false })
  }

  return (
    rejectFailure<Lookup<ApiKey>>(operation, response, id) ??
    decodeBody(
      operation,
      response,
      ApiKeyWireSchema,
      (wire): Lookup<ApiKey> => ({ found: true, entity: toApiKey(wire) }),
      id,
    )
  )
}

/**
 * Writes only the supplied fields in a single PUT. With nothing to change
 * no write is made and the current key is read back instead.
 */
export async function updateApiKey(
  transport: SendgridTransport,
  id: string,
  changes: ApiKeyChanges,
  signal?: AbortSignal,
): Promise<RequestResult<ApiKey>> {
  const operation = 'updating API key'
  if (!id) {
    return failed(preconditionError(operation, API_KEY_ID_REQUIRED))
  }

  const body = omitEmpty<ApiKeyWire>({
    name: changes.name,
    scopes: changes.scopes,
  })

  if (Object.keys(body).length === 0) {
    const current = await readApiKey(transport, id, signal)
    if (!current.ok) return current
    if (!current.value.found) {
      return failed(notFoundError(operation, id))
    }
    return succeeded(current.value.entity, current.statusCode)
  }

  const response = await transport.issueRequest(
    'PUT',
    apiKeyPath(id),
    body,
    signal,
  )

  return interpretResponse(operation, response, ApiKeyWireSchema, toApiKey, id)
}

/**
 * Deletes an API key; a key that is already gone counts as deleted.
 */
export async function deleteApiKey(
  transport: SendgridTransport,
  id: string,
  signal?: AbortSignal,
): Promise<RequestResult<DeleteOutcome>> {
  const operation = 'deleting API key'
  if (!id) {
    return failed(preconditionError(operation, API_KEY_ID_REQUIRED))
  }

  const response = await transport.issueRequest(
    'DELETE',
    apiKeyPath(id),
    undefined,
    signal,
  )

  if (!response.error && response.statusCode === 404) {
    return succeeded<DeleteOutcome>('already-absent', 204)
  }

  return (
    rejectFailure<DeleteOutcome>(operation, response, id) ??
    succeeded<DeleteOutcome>('deleted', response.statusCode)
  )
}
