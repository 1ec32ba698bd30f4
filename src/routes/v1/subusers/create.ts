import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  SubuserDesiredSchema,
  SubuserResponseSchema,
} from '@schemas/subusers/subusers.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    '/',
    {
      schema: {
        summary: 'Create subuser',
        operationId: 'createSubuser',
        description:
          'Creates the subuser, applies a declared disabled flag and returns the state read back from SendGrid',
        body: SubuserDesiredSchema,
        response: {
          201: SubuserResponseSchema,
          400: ErrorSchema,
          502: ErrorSchema,
          503: ErrorSchema,
        },
        tags: ['Subusers'],
      },
    },
    async (request, reply) => {
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const subuser = await fastify.sendgrid.subusers.create(
          request.body,
          signal,
        )

        reply.status(201)
        return {
          success: true,
          message: 'Subuser created successfully',
          subuser,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to create subuser',
          context: { username: request.body.username },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
