import pino from 'pino'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const

export type LogLevel = (typeof LOG_LEVELS)[number]

// stdout carries the operator audit trail, diagnostics go to stderr
const baseLogger = pino(
  {
    level: 'warn',
    timestamp: pino.stdTimeFunctions.isoTime,
  },
  pino.destination(2)
)

export const logger = baseLogger

export function setLogLevel(level: LogLevel): void {
  logger.level = level
}
