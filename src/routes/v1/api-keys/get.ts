import {
  ApiKeyParamsSchema,
  ApiKeyResponseSchema,
} from '@schemas/api-keys/api-keys.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/:id',
    {
      schema: {
        summary: 'Read API key',
        operationId: 'getApiKey',
        description:
          'Reads the API key from SendGrid. A 404 with code RESOURCE_GONE means it no longer exists.',
        params: ApiKeyParamsSchema,
        response: {
          200: ApiKeyResponseSchema,
          404: ErrorSchema,
          502: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['API Keys'],
      },
    },
    async (request, reply) => {
      const { id } = request.params
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const outcome = await fastify.sendgrid.apiKeys.read(
          id,
          undefined,
          signal,
        )

        if (outcome.status === 'gone') {
          reply.status(404)
          return {
            statusCode: 404,
            code: 'RESOURCE_GONE',
            error: 'Not Found',
            message: `API key ${id} no longer exists`,
          }
        }

        return {
          success: true,
          message: 'API key retrieved successfully',
          apiKey: outcome.state,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to read API key',
          context: { id },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
