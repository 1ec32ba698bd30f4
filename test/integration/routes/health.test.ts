import type { HealthCheckResponse } from '@schemas/health/health.schema.js'
import { describe, expect, it } from 'vitest'
import { build } from '../../helpers/app.js'

describe('Health Endpoint', () => {
  it('should return 200 and healthy status when credentials are configured', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/health',
    })

    expect(response.statusCode).toBe(200)

    const body = response.json<HealthCheckResponse>()
    expect(body.status).toBe('healthy')
    expect(body.checks.sendgridCredentials).toBe('configured')
    expect(body.timestamp).toMatch(
      /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/,
    )
  })

  it('should return 503 when no API key is configured', async (ctx) => {
    const app = await build(ctx)
    await app.ready()
    app.config.sendgridApiKey = '  '

    const response = await app.inject({
      method: 'GET',
      url: '/health',
    })

    expect(response.statusCode).toBe(503)

    const body = response.json<HealthCheckResponse>()
    expect(body.status).toBe('unhealthy')
    expect(body.checks.sendgridCredentials).toBe('missing')
  })

  it('should answer unknown routes with a 404 payload', async (ctx) => {
    const app = await build(ctx)

    const response = await app.inject({
      method: 'GET',
      url: '/v1/unknown',
    })

    expect(response.statusCode).toBe(404)
    expect(response.json()).toEqual({
      statusCode: 404,
      code: 'ROUTE_NOT_FOUND',
      error: 'Not Found',
      message: 'Route GET /v1/unknown not found',
    })
  })
})
