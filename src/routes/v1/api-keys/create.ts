import {
  ApiKeyDesiredSchema,
  ApiKeyResponseSchema,
} from '@schemas/api-keys/api-keys.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    '/',
    {
      schema: {
        summary: 'Create API key',
        operationId: 'createApiKey',
        description:
          'Creates an API key. The secret is only present in this response.',
        body: ApiKeyDesiredSchema,
        response: {
          201: ApiKeyResponseSchema,
          400: ErrorSchema,
          502: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['API Keys'],
      },
    },
    async (request, reply) => {
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const apiKey = await fastify.sendgrid.apiKeys.create(
          request.body,
          signal,
        )

        reply.status(201)
        return {
          success: true,
          message: 'API key created successfully',
          apiKey,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to create API key',
          context: { name: request.body.name },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
