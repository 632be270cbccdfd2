// Diagnostics for the monitor itself, never the tailed lines (those go to the consumer)
// Configure via env vars:
//   LOG_LEVEL: debug | info | warn | error (default: info)
//   LOG_FILE: path to log file (optional, production only)

import path from 'node:path'
import pino from 'pino'
import { config } from './config'

export type LogData = Record<string, unknown>
type LogLevel = 'debug' | 'info' | 'warn' | 'error'

const LOGGER_NAME = 'log-monitor'

// Env var takes precedence over config
function getLogLevel(): LogLevel {
  const level = process.env.LOG_LEVEL?.toLowerCase() ?? config.logLevel
  if (level === 'debug' || level === 'info' || level === 'warn' || level === 'error') {
    return level
  }
  return 'info'
}

function getLogFile(): string {
  const logFile = process.env.LOG_FILE ?? config.logFile
  if (logFile.startsWith('~/')) {
    const home = process.env.HOME || process.env.USERPROFILE || ''
    return path.join(home, logFile.slice(2))
  }
  return logFile
}

let fileDestination: ReturnType<typeof pino.destination> | null = null

function createLogger(): pino.Logger {
  const level = getLogLevel()

  if (process.env.NODE_ENV !== 'production') {
    try {
      return pino({
        name: LOGGER_NAME,
        level,
        transport: {
          target: 'pino-pretty',
          options: { colorize: true, translateTime: 'SYS:standard', ignore: 'pid,hostname' },
        },
      })
    } catch {
      // pino-pretty missing; use the plain JSON logger below
    }
  }

  // Sync destinations so the shutdown flush in index.ts loses nothing
  const logFile = getLogFile()
  if (logFile) {
    fileDestination = pino.destination({ dest: logFile, sync: true, mkdir: true })
    return pino(
      { name: LOGGER_NAME, level },
      pino.multistream([
        { level, stream: pino.destination({ dest: 1, sync: true }) },
        { level, stream: fileDestination },
      ])
    )
  }

  return pino({ name: LOGGER_NAME, level })
}

const pinoLogger: pino.Logger = createLogger()

// Call before process.exit() to ensure logs are written
export function flushLogger(): void {
  pinoLogger.flush()
  fileDestination?.flushSync()
}

// logger.info('event_name', { data }) on top of pino's logger.info({ data }, msg)
// Note: { ...data, event } ensures event field isn't overwritten by data
export const logger = {
  debug: (event: string, data?: LogData) => pinoLogger.debug({ ...data, event }),
  info: (event: string, data?: LogData) => pinoLogger.info({ ...data, event }),
  warn: (event: string, data?: LogData) => pinoLogger.warn({ ...data, event }),
  error: (event: string, data?: LogData) => pinoLogger.error({ ...data, event }),
}

export function describeError(error: unknown): LogData {
  const data: LogData = {
    message: error instanceof Error ? error.message : String(error),
  }
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    data.code = error.code
  }
  return data
}
