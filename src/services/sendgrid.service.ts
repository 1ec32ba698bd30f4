/**
 * SendGrid Service
 *
 * Entry point the host uses to reconcile subusers and API keys. Wires the
 * configured transport and retry policy into one lifecycle per entity type.
 */

import type { Config } from '@root/types/config.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger } from 'fastify'
import { ApiKeyLifecycle } from './sendgrid/lifecycle/api-key-lifecycle.js'
import type { LifecycleOptions } from './sendgrid/lifecycle/lifecycle-options.js'
import { SubuserLifecycle } from './sendgrid/lifecycle/subuser-lifecycle.js'
import {
  HttpTransport,
  type SendgridTransport,
} from './sendgrid/transport/http-transport.js'

export type SendgridServiceConfig = Pick<
  Config,
  | 'sendgridBaseUrl'
  | 'sendgridApiKey'
  | 'sendgridRequestTimeoutMs'
  | 'createTimeoutMs'
  | 'updateTimeoutMs'
  | 'deleteTimeoutMs'
  | 'retryInitialDelayMs'
  | 'retryMaxDelayMs'
  | 'retryMultiplier'
  | 'retryJitterRatio'
>

export function toLifecycleOptions(
  config: SendgridServiceConfig,
): LifecycleOptions {
  return {
    createTimeoutMs: config.createTimeoutMs,
    updateTimeoutMs: config.updateTimeoutMs,
    deleteTimeoutMs: config.deleteTimeoutMs,
    backoff: {
      initialDelayMs: config.retryInitialDelayMs,
      maxDelayMs: config.retryMaxDelayMs,
      multiplier: config.retryMultiplier,
      jitterRatio: config.retryJitterRatio,
    },
  }
}

export class SendgridService {
  readonly subusers: SubuserLifecycle
  readonly apiKeys: ApiKeyLifecycle
  private readonly closing = new AbortController()
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    config: SendgridServiceConfig,
    transport?: SendgridTransport,
  ) {
    const log = createServiceLogger(baseLog, 'SENDGRID')
    this.log = log
    const client =
      transport ??
      new HttpTransport(
        {
          baseUrl: config.sendgridBaseUrl,
          apiKey: config.sendgridApiKey,
          timeoutMs: config.sendgridRequestTimeoutMs,
        },
        log,
      )
    const options = toLifecycleOptions(config)

    this.subusers = new SubuserLifecycle(client, options, log)
    this.apiKeys = new ApiKeyLifecycle(client, options, log)

    log.debug(
      { baseUrl: config.sendgridBaseUrl, ...options.backoff },
      'SendGrid service initialized',
    )
  }

  /** Aborted once the service shuts down */
  get shutdownSignal(): AbortSignal {
    return this.closing.signal
  }

  /**
   * Cancels every retry loop still waiting, so they end with a
   * `cancelled` error instead of being cut off mid-backoff.
   */
  shutdown(): void {
    if (this.closing.signal.aborted) return
    this.log.info('Cancelling in-flight SendGrid operations')
    this.closing.abort(new Error('server shutting down'))
  }
}
