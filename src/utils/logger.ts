/**
 * Structured logging for propkit.
 *
 * The settings library itself only emits `debug` records (load/store
 * summaries, duplicate keys), so embedding applications see nothing unless
 * they raise the level. The CLI adds `error` records for unexpected failures.
 */

import pino from 'pino'

/** Logger configuration options */
export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

/** Level used for each NODE_ENV when no level variable is set */
const LEVEL_BY_NODE_ENV: Record<string, string> = {
  production: 'info',
  development: 'debug',
  test: 'silent',
}

/** Level fallback for library and CLI use outside a known NODE_ENV */
const FALLBACK_LEVEL = 'warn'

/**
 * Resolve the log level: `PROPKIT_LOG_LEVEL`, then `LOG_LEVEL`, then the
 * NODE_ENV table, then `warn`.
 */
export function resolveLogLevel(env: NodeJS.ProcessEnv = process.env): string {
  const explicit = env.PROPKIT_LOG_LEVEL ?? env.LOG_LEVEL
  if (explicit) return explicit
  const nodeEnv = env.NODE_ENV
  return (nodeEnv !== undefined ? LEVEL_BY_NODE_ENV[nodeEnv] : undefined) ?? FALLBACK_LEVEL
}

/** Pretty output only on request or while developing; pino-pretty is a devDependency */
function wantsPrettyOutput(env: NodeJS.ProcessEnv = process.env): boolean {
  if (env.LOG_PRETTY !== undefined) return env.LOG_PRETTY === 'true'
  return env.NODE_ENV === 'development'
}

/**
 * Create a named logger
 * @param name - module identifier, written as the `name` field
 */
export function createLogger(
  name: string,
  options: LoggerOptions = {}
): pino.Logger {
  const loggerOptions: pino.LoggerOptions = {
    name: options.name ?? name,
    level: options.level ?? resolveLogLevel(),
    formatters: {
      level(label) {
        return { level: label }
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: {
      pid: process.pid,
    },
  }

  if (options.pretty ?? wantsPrettyOutput()) {
    return pino({
      ...loggerOptions,
      transport: {
        target: 'pino-pretty',
        options: {
          colorize: true,
          translateTime: 'SYS:standard',
          ignore: 'pid,hostname',
        },
      },
    })
  }

  return pino(loggerOptions)
}

/** Root logger for code outside a named module */
export const logger = createLogger('propkit')

/** Bind extra fields (a file path, a command name) to every record */
export function childLogger(
  parent: pino.Logger,
  bindings: Record<string, unknown>
): pino.Logger {
  return parent.child(bindings)
}
