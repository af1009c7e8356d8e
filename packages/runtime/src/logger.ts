// @tokensmith/runtime - Diagnostic logging (winston-backed by default)

import { createLogger as createWinstonLogger, format, transports } from 'winston'
import type { Logger as WinstonLogger } from 'winston'

/** Structured fields attached to a log entry, e.g. `{ token, reason }` */
export type LogMeta = Readonly<Record<string, unknown>>

/**
 * Logging seam used throughout the runtime.
 *
 * Severity mapping:
 * - `error`: a token could not be produced (CSPRNG unavailable)
 * - `warn`: a value was clamped or demoted, signing degraded, cache degraded
 * - `debug`: cache hits, subject filter skips
 */
export interface Logger {
  debug(message: string, meta?: LogMeta): void
  info(message: string, meta?: LogMeta): void
  warn(message: string, meta?: LogMeta): void
  error(message: string, meta?: LogMeta): void
}

export interface LoggerOptions {
  /** Minimum level (default: `TOKENSMITH_LOG_LEVEL`, else `info`) */
  readonly level?: string | undefined
  /** JSON lines instead of the human-readable format (default: `NODE_ENV === 'production'`) */
  readonly json?: boolean | undefined
  /** Write to this stream instead of the console */
  readonly stream?: NodeJS.WritableStream | undefined
  readonly silent?: boolean | undefined
}

/** Discards everything */
export const noopLogger: Logger = {
  debug(): void {},
  info(): void {},
  warn(): void {},
  error(): void {},
}

function lineFormat(): ReturnType<typeof format.printf> {
  return format.printf((info) => {
    const { timestamp, level, message, stack, ...meta } = info
    let line = `${String(timestamp)} [${level.toUpperCase()}] ${String(message)}`
    if (Object.keys(meta).length > 0) {
      line += ` ${JSON.stringify(meta)}`
    }
    if (typeof stack === 'string') {
      line += `\n${stack}`
    }
    return line
  })
}

/** Adapts an existing winston logger to the runtime's Logger interface */
export function fromWinston(logger: WinstonLogger): Logger {
  return {
    debug: (message, meta) => {
      logger.debug(message, meta ?? {})
    },
    info: (message, meta) => {
      logger.info(message, meta ?? {})
    },
    warn: (message, meta) => {
      logger.warn(message, meta ?? {})
    },
    error: (message, meta) => {
      logger.error(message, meta ?? {})
    },
  }
}

/**
 * Creates the default logger: a winston logger with one transport.
 *
 * @example
 * ```typescript
 * const tokensmith = createTokensmith({ logger: createLogger({ level: 'debug' }), ... })
 * ```
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const json = options.json ?? process.env['NODE_ENV'] === 'production'
  const silent = options.silent ?? false

  const transport =
    options.stream === undefined
      ? new transports.Console({ silent })
      : new transports.Stream({ stream: options.stream, silent })

  return fromWinston(
    createWinstonLogger({
      level: options.level ?? process.env['TOKENSMITH_LOG_LEVEL'] ?? 'info',
      format: format.combine(
        format.timestamp(),
        format.errors({ stack: true }),
        json ? format.json() : lineFormat(),
      ),
      defaultMeta: { service: 'tokensmith' },
      transports: [transport],
    }),
  )
}
