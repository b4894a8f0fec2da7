import pino from 'pino'
import pinoHttp from 'pino-http'

const isDev = process.env.NODE_ENV !== 'production'
const isTest = process.env.NODE_ENV === 'test' || process.env.VITEST === 'true'

export const logger = pino({
  level: process.env.LOG_LEVEL ?? (isTest ? 'silent' : isDev ? 'debug' : 'info'),
  transport:
    isDev && !isTest
      ? {
          target: 'pino-pretty',
          options: { colorize: true }
        }
      : undefined
})

export const httpLogger = pinoHttp({
  logger,
  autoLogging: true,
  customLogLevel: (_req, res, err) => {
    if (res.statusCode >= 500 || err) return 'error'
    if (res.statusCode >= 400) return 'warn'
    return 'info'
  }
})
