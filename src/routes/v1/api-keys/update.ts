import {
  ApiKeyParamsSchema,
  ApiKeyResponseSchema,
  UpdateApiKeyBodySchema,
} from '@schemas/api-keys/api-keys.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.patch(
    '/:id',
    {
      schema: {
        summary: 'Update API key',
        operationId: 'updateApiKey',
        description:
          'Renames the key and replaces its scopes where they differ from the prior state',
        params: ApiKeyParamsSchema,
        body: UpdateApiKeyBodySchema,
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
      const { id } = request.params
      const { prior, desired } = request.body
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const apiKey = await fastify.sendgrid.apiKeys.update(
          id,
          prior,
          desired,
          signal,
        )

        return {
          success: true,
          message: 'API key updated successfully',
          apiKey,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to update API key',
          context: { id },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
