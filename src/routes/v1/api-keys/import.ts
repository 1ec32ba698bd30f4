import {
  ApiKeyResponseSchema,
  ImportApiKeyBodySchema,
} from '@schemas/api-keys/api-keys.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    '/import',
    {
      schema: {
        summary: 'Import API key',
        operationId: 'importApiKey',
        description:
          'Adopts an existing API key by id. The secret cannot be recovered.',
        body: ImportApiKeyBodySchema,
        response: {
          200: ApiKeyResponseSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          502: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['API Keys'],
      },
    },
    async (request, reply) => {
      const { id } = request.body
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const apiKey = await fastify.sendgrid.apiKeys.import(id, signal)

        return {
          success: true,
          message: 'API key imported successfully',
          apiKey,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to import API key',
          context: { id },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
