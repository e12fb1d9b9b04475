import winston from 'winston'
import DailyRotateFile from 'winston-daily-rotate-file'
import { ENV } from '../config/env'

const { combine, timestamp, printf, json, colorize } = winston.format

export interface ConsoleLine {
  level: string
  message: unknown
  timestamp?: unknown
  stack?: unknown
}

// Human-readable console line; an error's stack follows on the next lines
export const formatConsoleLine = ({ timestamp, level, message, stack }: ConsoleLine): string => {
  const line = `${timestamp} [${level.toUpperCase()}]: ${message}`
  return typeof stack === 'string' ? `${line}\n${stack}` : line
}

/** Meta that carries an error's stack into the log entry without repeating its message. */
export const errorMeta = (error: unknown): { stack?: string } =>
  error instanceof Error && error.stack ? { stack: error.stack } : {}

const consoleFormat = printf((info) => formatConsoleLine(info))

const transports: winston.transport[] = [
  // 1. Pretty logs on console (for development)
  new winston.transports.Console({
    format: combine(colorize(), timestamp(), consoleFormat),
    silent: ENV.NODE_ENV === 'test',
  }),
]

if (ENV.NODE_ENV !== 'test') {
  // 2. Daily rotating production logs
  transports.push(
    new DailyRotateFile({
      dirname: 'logs',
      filename: 'app-%DATE%.log',
      datePattern: 'YYYY-MM-DD',
      zippedArchive: true,
      maxSize: '20m',
      maxFiles: '14d',
      format: combine(timestamp(), json()),
    }),
  )
}

const winstonLogger = winston.createLogger({
  level: ENV.LOG_LEVEL,
  format: combine(timestamp(), json()),
  transports,
})

const logger = {
  info: (message: string, ...meta: unknown[]) => winstonLogger.info(message, ...meta),
  warn: (message: string, ...meta: unknown[]) => winstonLogger.warn(message, ...meta),
  error: (message: string, ...meta: unknown[]) => winstonLogger.error(message, ...meta),
  debug: (message: string, ...meta: unknown[]) => winstonLogger.debug(message, ...meta),

  // Custom timer log helper
  timerLog: (label: string, startTime: number) => {
    const duration = Date.now() - startTime
    winstonLogger.info(`[TIMER] ${label} - ${duration}ms`)
  },
}

export default logger
