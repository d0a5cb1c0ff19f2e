/**
 * pino loggers for envkeeper.
 *
 * Records go to stderr so they never mix with prompts or `--output-format json`
 * lines on stdout. Plain CLI runs only show warnings and errors.
 */

import pino from 'pino'
import { PINO_REDACT_PATHS } from '../cli/utils/masking.js'

export interface LoggerOptions {
  level?: string
  name?: string
  pretty?: boolean
}

export interface LogSettings {
  level: string
  pretty: boolean
}

const STDERR_FD = 2

/**
 * Work out level and output style from the environment.
 *
 * `ENVKEEPER_LOG_LEVEL` wins over `LOG_LEVEL`; without either the level
 * follows NODE_ENV. `LOG_PRETTY` forces pino-pretty on or off.
 */
export function resolveLogSettings(env: NodeJS.ProcessEnv = process.env): LogSettings {
  const nodeEnv = env.NODE_ENV
  const devLike = nodeEnv === 'development' || nodeEnv === 'test'

  let level = env.ENVKEEPER_LOG_LEVEL ?? env.LOG_LEVEL ?? ''
  if (level === '') {
    level = nodeEnv === 'production' ? 'info' : devLike ? 'debug' : 'warn'
  }

  const pretty = env.LOG_PRETTY !== undefined ? env.LOG_PRETTY === 'true' : devLike
  return { level, pretty }
}

/** Create a logger bound to one module name */
export function createLogger(name: string, options: LoggerOptions = {}): pino.Logger {
  const settings = resolveLogSettings()

  const config: pino.LoggerOptions = {
    name: options.name ?? name,
    level: options.level ?? settings.level,
    redact: PINO_REDACT_PATHS,
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    base: { pid: process.pid },
  }

  if (!(options.pretty ?? settings.pretty)) {
    return pino(config, pino.destination(STDERR_FD))
  }

  // pino-pretty is a devDependency
  return pino({
    ...config,
    transport: {
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        ignore: 'pid,hostname',
        destination: STDERR_FD,
      },
    },
  })
}
