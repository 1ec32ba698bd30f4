import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import type { Config } from '@root/types/config.types.js'

// Default retry budget for each write operation
const DEFAULT_OPERATION_TIMEOUT_MS = 20 * 60 * 1000

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 3003,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    sendgridBaseUrl: {
      type: 'string',
      default: 'https://api.sendgrid.com/v3',
    },
    sendgridApiKey: {
      type: 'string',
      default: '',
    },
    sendgridRequestTimeoutMs: {
      type: 'number',
      default: 30000,
    },
    createTimeoutMs: {
      type: 'number',
      default: DEFAULT_OPERATION_TIMEOUT_MS,
    },
    updateTimeoutMs: {
      type: 'number',
      default: DEFAULT_OPERATION_TIMEOUT_MS,
    },
    deleteTimeoutMs: {
      type: 'number',
      default: DEFAULT_OPERATION_TIMEOUT_MS,
    },
    retryInitialDelayMs: {
      type: 'number',
      default: 500,
    },
    retryMaxDelayMs: {
      type: 'number',
      default: 10000,
    },
    retryMultiplier: {
      type: 'number',
      default: 2,
    },
    retryJitterRatio: {
      type: 'number',
      default: 0.1,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'config',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const config = fastify.config

    try {
      new URL(config.sendgridBaseUrl)
    } catch {
      throw new Error(
        `Invalid sendgridBaseUrl "${config.sendgridBaseUrl}". Must be an absolute URL such as https://api.sendgrid.com/v3`,
      )
    }

    if (config.retryJitterRatio < 0 || config.retryJitterRatio >= 1) {
      throw new Error('retryJitterRatio must be at least 0 and below 1')
    }

    if (config.retryMultiplier < 1) {
      throw new Error('retryMultiplier must be at least 1')
    }

    if (config.retryInitialDelayMs > config.retryMaxDelayMs) {
      throw new Error('retryInitialDelayMs cannot exceed retryMaxDelayMs')
    }

    if (!config.sendgridApiKey || config.sendgridApiKey.trim() === '') {
      fastify.log.warn(
        'No sendgridApiKey configured. Every SendGrid request will be rejected with 401 until one is set.',
      )
    }
  },
  {
    name: 'config',
  },
)
