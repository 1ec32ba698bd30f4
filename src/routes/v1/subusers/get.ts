import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  SubuserParamsSchema,
  SubuserResponseSchema,
} from '@schemas/subusers/subusers.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.get(
    '/:username',
    {
      schema: {
        summary: 'Read subuser',
        operationId: 'getSubuser',
        description:
          'Reads the subuser from SendGrid. A 404 with code RESOURCE_GONE means it no longer exists and should be dropped from desired state.',
        params: SubuserParamsSchema,
        response: {
          200: SubuserResponseSchema,
          404: ErrorSchema,
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
        const outcome = await fastify.sendgrid.subusers.read(
          username,
          undefined,
          signal,
        )

        if (outcome.status === 'gone') {
          reply.status(404)
          return {
            statusCode: 404,
            code: 'RESOURCE_GONE',
            error: 'Not Found',
            message: `subuser ${username} no longer exists`,
          }
        }

        return {
          success: true,
          message: 'Subuser retrieved successfully',
          subuser: outcome.state,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to read subuser',
          context: { username },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
