import fs from 'node:fs'
import { dirname, resolve } from 'node:path'
import { fileURLToPath } from 'node:url'
import { config } from 'dotenv'
import type { FastifyBaseLogger, FastifyRequest } from 'fastify'
import type { LevelWithSilent, LoggerOptions } from 'pino'
import pino from 'pino'
import * as rfs from 'rotating-file-stream'

export const validLogLevels: LevelWithSilent[] = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent',
]

interface FileLoggerOptions extends LoggerOptions {
  stream: rfs.RotatingFileStream | NodeJS.WriteStream
}

interface MultiStreamLoggerOptions extends LoggerOptions {
  stream: pino.MultiStreamRes
}

type ReconcilerLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env early so logger settings apply before the app boots
config({ path: resolve(projectRoot, '.env') })

type Serializable = Error | Record<string, unknown> | string | number | boolean

/**
 * Creates an error serializer that keeps the SendGrid request context
 * (kind, operation, identifier, status code) next to the message and stack.
 */
function createErrorSerializer() {
  const serialize = (err: Serializable | null | undefined): unknown => {
    if (err == null) {
      return err
    }

    if (typeof err !== 'object') {
      const primitiveType =
        typeof err === 'string'
          ? 'StringError'
          : typeof err === 'number'
            ? 'NumberError'
            : 'BooleanError'
      return { message: String(err), type: primitiveType }
    }

    const serialized: Record<string, unknown> = {}

    if ('message' in err && err.message) serialized.message = err.message
    if ('name' in err && err.name) serialized.name = err.name
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode
    if ('kind' in err && err.kind !== undefined) serialized.kind = err.kind
    if ('operation' in err && err.operation !== undefined)
      serialized.operation = err.operation
    if ('identifier' in err && err.identifier !== undefined)
      serialized.identifier = err.identifier

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Stack traces are noise for 4xx answers
    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : undefined
    const shouldIncludeStack = !statusCode || statusCode >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    // cause is non-enumerable on Error
    if ('cause' in err && err.cause) {
      const cause = err.cause
      serialized.cause =
        cause instanceof Error ||
        typeof cause === 'string' ||
        typeof cause === 'number' ||
        typeof cause === 'boolean'
          ? serialize(cause)
          : cause
    }

    return serialized
  }

  return serialize
}

/**
 * Serializes Fastify requests with secrets redacted from the query string.
 */
function createRequestSerializer() {
  return (req: FastifyRequest) => {
    const serialized = {
      method: req.method,
      url: req.url,
      host: req.headers.host,
      remoteAddress: req.ip,
      remotePort: req.socket.remotePort,
    }

    if (serialized.url) {
      serialized.url = serialized.url
        .replace(/([?&])apiKey=([^&]+)/gi, '$1apiKey=[REDACTED]')
        .replace(/([?&])api_key=([^&]+)/gi, '$1api_key=[REDACTED]')
        .replace(/([?&])password=([^&]+)/gi, '$1password=[REDACTED]')
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Rotated log file name: `reconciler-current.log` while writing,
 * `reconciler-YYYY-MM-DD[-index].log` once rotated.
 */
export function filename(time: number | Date | null, index?: number): string {
  if (!time) return 'reconciler-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `reconciler-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Rotating file stream under `data/logs`, or stdout when the directory
 * cannot be created.
 */
function getFileStream(): rfs.RotatingFileStream | NodeJS.WriteStream {
  const logDirectory = resolve(projectRoot, 'data', 'logs')
  try {
    if (!fs.existsSync(logDirectory)) {
      fs.mkdirSync(logDirectory, { recursive: true })
    }
    return rfs.createStream(filename, {
      size: '10M',
      path: logDirectory,
      compress: 'gzip',
      maxFiles: 7,
    })
  } catch (err) {
    console.error('Failed to setup log directory:', err)
    return process.stdout
  }
}

const serializers = () => ({
  req: createRequestSerializer(),
  error: createErrorSerializer(),
  err: createErrorSerializer(),
})

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: {
        translateTime: 'HH:MM:ss Z',
        ignore: 'pid,hostname',
        colorize: true,
      },
    },
    serializers: serializers(),
  }
}

/**
 * Logger options built from the environment.
 *
 * Always logs to file. `enableConsoleOutput=false` turns the pretty
 * terminal stream off.
 */
export function createLoggerConfig(): ReconcilerLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return {
      level: 'info',
      stream: fileStream,
      serializers: serializers(),
    }
  }

  // Avoid double-logging when the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: {
      translateTime: 'HH:MM:ss Z',
      ignore: 'pid,hostname',
      colorize: true,
    },
  })

  const multistream = pino.multistream([
    { stream: prettyStream },
    { stream: fileStream },
  ])

  return {
    level: 'info',
    stream: multistream,
    serializers: serializers(),
  }
}

/**
 * Child logger whose messages carry an uppercased `[SERVICE] ` prefix.
 */
export function createServiceLogger(
  parent: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return parent.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
