import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  SubuserParamsSchema,
  SubuserResponseSchema,
  UpdateSubuserBodySchema,
} from '@schemas/subusers/subusers.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.patch(
    '/:username',
    {
      schema: {
        summary: 'Update subuser',
        operationId: 'updateSubuser',
        description:
          'Writes each field that differs between prior and desired state, then returns the state read back from SendGrid',
        params: SubuserParamsSchema,
        body: UpdateSubuserBodySchema,
        response: {
          200: SubuserResponseSchema,
          400: ErrorSchema,
          404: ErrorSchema,
          502: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Subusers'],
      },
    },
    async (request, reply) => {
      const { username } = request.params
      const { prior, desired } = request.body
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const subuser = await fastify.sendgrid.subusers.update(
          username,
          prior,
          desired,
          signal,
        )

        return {
          success: true,
          message: 'Subuser updated successfully',
          subuser,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to update subuser',
          context: { username },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
