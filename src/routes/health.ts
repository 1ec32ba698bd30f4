import {
  type HealthCheckResponse,
  HealthCheckResponseSchema,
} from '@schemas/health/health.schema.js'
import type { FastifyPluginAsync } from 'fastify'

const plugin: FastifyPluginAsync = async (fastify) => {
  fastify.get<{
    Reply: HealthCheckResponse
  }>(
    '/health',
    {
      schema: {
        summary: 'Health check endpoint',
        operationId: 'getHealth',
        description:
          'Returns the health status of the service. Reports unhealthy while no SendGrid API key is configured.',
        response: {
          200: HealthCheckResponseSchema,
          503: HealthCheckResponseSchema,
        },
        tags: ['System'],
      },
    },
    async (_request, reply) => {
      const timestamp = new Date().toISOString()
      const credentials =
        fastify.config.sendgridApiKey.trim() === '' ? 'missing' : 'configured'

      if (credentials === 'missing') {
        fastify.log.warn('Health check failed: no SendGrid API key configured')
      }

      const isHealthy = credentials === 'configured'

      return reply.status(isHealthy ? 200 : 503).send({
        status: isHealthy ? 'healthy' : 'unhealthy',
        timestamp,
        checks: {
          sendgridCredentials: credentials,
        },
      })
    },
  )
}

export default plugin
