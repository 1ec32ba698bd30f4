/**
 * The part of a Fastify reply needed to notice a client that went away.
 */
interface ReplyConnection {
  raw: {
    writableEnded: boolean
    once(event: 'close', listener: () => void): unknown
  }
}

/**
 * Signal for one request: aborts when the service shuts down, or when the
 * connection closes before the reply was written.
 */
export function requestSignal(
  shutdown: AbortSignal,
  reply: ReplyConnection,
): AbortSignal {
  const disconnect = new AbortController()
  reply.raw.once('close', () => {
    if (!reply.raw.writableEnded) {
      disconnect.abort(new Error('client disconnected'))
    }
  })
  return AbortSignal.any([shutdown, disconnect.signal])
}
