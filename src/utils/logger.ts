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

type UpgradarrLoggerOptions =
  | LoggerOptions
  | FileLoggerOptions
  | MultiStreamLoggerOptions

const __filename = fileURLToPath(import.meta.url)
const __dirname = dirname(__filename)
const projectRoot = resolve(__dirname, '..', '..')

// Load .env file early for logger configuration
config({ path: resolve(projectRoot, '.env') })

const PRETTY_OPTIONS = {
  translateTime: 'HH:MM:ss Z',
  ignore: 'pid,hostname',
  colorize: true,
}

/**
 * Creates an error serializer that handles standard errors, the engine's
 * status-carrying errors and plain values thrown by accident.
 *
 * Stack traces are dropped for 4xx errors; `cause` chains are serialized
 * recursively.
 */
function createErrorSerializer() {
  const serialize = (err: unknown): unknown => {
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
    if ('status' in err && err.status !== undefined)
      serialized.status = err.status
    if ('statusCode' in err && err.statusCode !== undefined)
      serialized.statusCode = err.statusCode

    if (err instanceof TypeError) {
      serialized.type = 'TypeError'
    } else if (err instanceof RangeError) {
      serialized.type = 'RangeError'
    } else if (err instanceof SyntaxError) {
      serialized.type = 'SyntaxError'
    } else if (err instanceof AggregateError) {
      serialized.type = 'AggregateError'
    } else if (err instanceof Error) {
      serialized.type = 'Error'
    } else if ('name' in err && typeof err.name === 'string' && err.name) {
      serialized.type = err.name
    } else {
      serialized.type = 'UnknownError'
    }

    // Client errors are expected; keep their stacks out of the logs
    const statusCode =
      'statusCode' in err && typeof err.statusCode === 'number'
        ? err.statusCode
        : 'status' in err && typeof err.status === 'number'
          ? err.status
          : undefined
    const shouldIncludeStack = !statusCode || statusCode >= 500
    if ('stack' in err && err.stack && shouldIncludeStack) {
      serialized.stack = err.stack
    }

    if ('cause' in err && err.cause) {
      serialized.cause = serialize(err.cause)
    }

    for (const [key, value] of Object.entries(err)) {
      if (
        !['message', 'stack', 'name', 'status', 'statusCode', 'type'].includes(
          key,
        )
      ) {
        serialized[key] = value
      }
    }

    return serialized
  }
  return serialize
}

/**
 * Returns a request serializer that redacts credential-bearing query
 * parameters (`apiKey`, `token`, `access_token`) from the logged URL.
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
        .replace(/([?&])token=([^&]+)/gi, '$1token=[REDACTED]')
        .replace(/([?&])access_token=([^&]+)/gi, '$1access_token=[REDACTED]')
    }

    return serialized
  }
}

/**
 * Generates a log filename for the rotating stream.
 *
 * Without a date the active file `upgradarr-current.log` is returned,
 * otherwise `upgradarr-YYYY-MM-DD[-index].log`.
 */
function filename(time: number | Date, index?: number): string {
  if (!time) return 'upgradarr-current.log'
  const date = typeof time === 'number' ? new Date(time) : time
  const year = date.getFullYear()
  const month = String(date.getMonth() + 1).padStart(2, '0')
  const day = String(date.getDate()).padStart(2, '0')
  const indexStr = index ? `-${index}` : ''
  return `upgradarr-${year}-${month}-${day}${indexStr}.log`
}

/**
 * Creates the rotating log file stream under `data/logs`, falling back to
 * stdout when the directory cannot be created.
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

function getTerminalOptions(): LoggerOptions {
  return {
    level: 'info',
    transport: {
      target: 'pino-pretty',
      options: PRETTY_OPTIONS,
    },
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

function getFileOptions(
  stream: rfs.RotatingFileStream | NodeJS.WriteStream,
): FileLoggerOptions {
  return {
    level: 'info',
    stream,
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Generates logger configuration options based on environment variables.
 *
 * Always logs to file. Environment variables:
 * - enableConsoleOutput: also show logs in the terminal (default: true)
 *
 * The level starts at `info`; the server applies the configured `logLevel`
 * once the config plugin has loaded.
 */
export function createLoggerConfig(): UpgradarrLoggerOptions {
  const enableConsoleOutput = process.env.enableConsoleOutput !== 'false'

  const fileStream = getFileStream()

  if (!enableConsoleOutput) {
    return getFileOptions(fileStream)
  }

  // Avoid double-logging if the file stream fell back to stdout
  if (fileStream === process.stdout) {
    return getTerminalOptions()
  }

  const prettyStream = pino.transport({
    target: 'pino-pretty',
    options: PRETTY_OPTIONS,
  })

  const multistream = pino.multistream([
    { stream: prettyStream },
    { stream: fileStream },
  ])

  return {
    level: 'info',
    stream: multistream,
    serializers: {
      req: createRequestSerializer(),
      error: createErrorSerializer(),
    },
  }
}

/**
 * Creates a child logger whose messages carry a `[NAME] ` prefix.
 *
 * @example
 * const log = createServiceLogger(fastify.log, 'radarr')
 * log.info('Tag created') // "[RADARR] Tag created"
 */
export function createServiceLogger(
  log: FastifyBaseLogger,
  service: string,
): FastifyBaseLogger {
  return log.child({}, { msgPrefix: `[${service.toUpperCase()}] ` })
}
