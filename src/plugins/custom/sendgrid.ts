import { SendgridService } from '@services/sendgrid.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    sendgrid: SendgridService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const sendgridService = new SendgridService(fastify.log, fastify.config)

    fastify.decorate('sendgrid', sendgridService)

    // preClose runs before in-flight requests are waited on
    fastify.addHook('preClose', async () => {
      sendgridService.shutdown()
    })
  },
  {
    name: 'sendgrid',
    dependencies: ['config'],
  },
)
