import type { ApiKeyResponse } from '@schemas/api-keys/api-keys.schema.js'
import type { ErrorResponse } from '@schemas/common/error.schema.js'
import type { DeleteOutcomeResponse } from '@schemas/common/delete-outcome.schema.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'
import {
  fakeSendgrid,
  rateLimited,
  SENDGRID_TEST_BASE_URL,
} from '../../mocks/sendgrid-api-handlers.js'
import { server } from '../../setup/msw-setup.js'

describe('API key routes', () => {
  it('should create a key and return its secret once', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'POST',
      url: '/v1/api-keys',
      payload: { name: 'deploy', scopes: ['mail.send'] },
    })

    expect(response.statusCode).toBe(201)
    expect(response.json<ApiKeyResponse>()).toEqual({
      success: true,
      message: 'API key created successfully',
      apiKey: {
        id: 'key-1001',
        name: 'deploy',
        scopes: ['mail.send'],
        apiKey: 'SG.placeholder-key-1001',
      },
    })
  })

  it('should retry through a single rate limit', async (ctx) => {
    const app = await build(ctx)
    server.use(
      http.post(`${SENDGRID_TEST_BASE_URL}/api_keys`, () => rateLimited(1), {
        once: true,
      }),
    )

    const response = await app.inject({
      method: 'POST',
      url: '/v1/api-keys',
      payload: { name: 'deploy' },
    })

    expect(response.statusCode).toBe(201)
    expect(fakeSendgrid.apiKeys.size).toBe(1)
  })

  it('should reject a missing name', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'POST',
      url: '/v1/api-keys',
      payload: { name: '' },
    })

    expect(response.statusCode).toBe(400)
    expect(fakeSendgrid.calls).toEqual([])
  })

  it('should answer RESOURCE_GONE for a deleted key', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/v1/api-keys/key-404',
    })

    expect(response.statusCode).toBe(404)
    expect(response.json<ErrorResponse>()).toEqual({
      statusCode: 404,
      code: 'RESOURCE_GONE',
      error: 'Not Found',
      message: 'API key key-404 no longer exists',
    })
  })

  it('should rename a key', async (ctx) => {
    const app = await build(ctx)
    const seeded = fakeSendgrid.seedApiKey({ name: 'ops' })

    const response = await app.inject({
      method: 'PATCH',
      url: `/v1/api-keys/${seeded.api_key_id}`,
      payload: {
        prior: { id: seeded.api_key_id, name: 'ops', scopes: ['mail.send'] },
        desired: { name: 'ops-v2' },
      },
    })

    expect(response.statusCode).toBe(200)
    expect(response.json<ApiKeyResponse>().apiKey).toEqual({
      id: 'key-1001',
      name: 'ops-v2',
      scopes: ['mail.send'],
    })
  })

  it('should delete idempotently', async (ctx) => {
    const app = await build(ctx)
    const seeded = fakeSendgrid.seedApiKey({ name: 'ops' })

    const first = await app.inject({
      method: 'DELETE',
      url: `/v1/api-keys/${seeded.api_key_id}`,
    })
    const second = await app.inject({
      method: 'DELETE',
      url: `/v1/api-keys/${seeded.api_key_id}`,
    })

    expect(first.json<DeleteOutcomeResponse>().outcome).toBe('deleted')
    expect(second.json<DeleteOutcomeResponse>()).toEqual({
      success: true,
      message: 'API key was already deleted',
      outcome: 'already-absent',
    })
  })

  it('should surface a failed read as 502', async (ctx) => {
    const app = await build(ctx)
    server.use(
      http.get(`${SENDGRID_TEST_BASE_URL}/api_keys/:id`, () =>
        HttpResponse.json(
          { errors: [{ field: null, message: 'access forbidden' }] },
          { status: 403 },
        ),
      ),
    )

    const response = await app.inject({
      method: 'POST',
      url: '/v1/api-keys/import',
      payload: { id: 'key-1' },
    })

    expect(response.statusCode).toBe(502)
    expect(response.json<ErrorResponse>()).toEqual({
      statusCode: 502,
      code: 'SENDGRID_REMOTE_REJECTION',
      error: 'Bad Gateway',
      message:
        'failed reading API key (key-1), status: 403, response: {"errors":[{"field":null,"message":"access forbidden"}]} (access forbidden)',
    })
  })
})
