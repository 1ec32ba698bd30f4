import { DeleteOutcomeResponseSchema } from '@schemas/common/delete-outcome.schema.js'
import { ErrorSchema } from '@schemas/common/error.schema.js'
import { SubuserParamsSchema } from '@schemas/subusers/subusers.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.delete(
    '/:username',
    {
      schema: {
        summary: 'Delete subuser',
        operationId: 'deleteSubuser',
        description:
          'Deletes the subuser. Deleting a subuser that no longer exists succeeds with outcome already-absent.',
        params: SubuserParamsSchema,
        response: {
          200: DeleteOutcomeResponseSchema,
          502: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Subusers'],
      },
    },
    async (request, reply) => {
      const { username } = request.params
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const outcome = await fastify.sendgrid.subusers.delete(
          username,
          signal,
        )

        return {
          success: true,
          message:
            outcome === 'deleted'
              ? 'Subuser deleted successfully'
              : 'Subuser was already deleted',
          outcome,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to delete subuser',
          context: { username },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
