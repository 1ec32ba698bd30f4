import { ApiKeyParamsSchema } from '@schemas/api-keys/api-keys.schema.js'
import { DeleteOutcomeResponseSchema } from '@schemas/common/delete-outcome.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.delete(
    '/:id',
    {
      schema: {
        summary: 'Delete API key',
        operationId: 'deleteApiKey',
        description:
          'Revokes the API key. Revoking a key that no longer exists succeeds with outcome already-absent.',
        params: ApiKeyParamsSchema,
        response: {
          200: DeleteOutcomeResponseSchema,
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
        const outcome = await fastify.sendgrid.apiKeys.delete(id, signal)

        return {
          success: true,
          message:
            outcome === 'deleted'
              ? 'API key deleted successfully'
              : 'API key was already deleted',
          outcome,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to delete API key',
          context: { id },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
