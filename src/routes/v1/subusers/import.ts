import { ErrorSchema } from '@schemas/common/error.schema.js'
import {
  ImportSubuserBodySchema,
  SubuserResponseSchema,
} from '@schemas/subusers/subusers.schema.js'
import { requestSignal } from '@utils/request-signal.js'
import { logRouteError, routeErrorLevel } from '@utils/route-errors.js'
import type { FastifyPluginAsyncZod } from 'fastify-type-provider-zod'

const plugin: FastifyPluginAsyncZod = async (fastify) => {
  fastify.post(
    '/import',
    {
      schema: {
        summary: 'Import subuser',
        operationId: 'importSubuser',
        description:
          'Adopts an existing subuser by username. The password is unknown until the next update declares it.',
        body: ImportSubuserBodySchema,
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
      const { username } = request.body
      const signal = requestSignal(fastify.sendgrid.shutdownSignal, reply)
      try {
        const subuser = await fastify.sendgrid.subusers.import(
          username,
          signal,
        )

        return {
          success: true,
          message: 'Subuser imported successfully',
          subuser,
        }
      } catch (error) {
        logRouteError(fastify.log, request, error, {
          message: 'Failed to import subuser',
          context: { username },
          level: routeErrorLevel(error),
        })
        throw error
      }
    },
  )
}

export default plugin
