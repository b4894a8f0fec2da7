import express from 'express'
import cors from 'cors'
import helmet from 'helmet'
import { ApiErrorCode } from '@shared/types'
import { env } from './config/env'
import { httpLogger, logger } from './logger'
import { healthHandler, readinessHandler } from './routes/health'
import { ApiHttpError, apiErrorHandler } from './middleware/api-error'
import { buildContactAdminRouter, buildContactRouter } from './modules/contact/contact.routes'
import { createContactContext, type ContactContext } from './modules/contact/contact.context'

const DEFAULT_ALLOWED_ORIGINS = [
  'http://localhost:5173',
  'http://127.0.0.1:5173',
  'http://localhost:3000',
  'http://127.0.0.1:3000'
]

export interface BuildAppOptions {
  contact?: ContactContext
}

export function buildApp(options: BuildAppOptions = {}) {
  const app = express()
  const contact = options.contact ?? createContactContext()

  app.set('etag', false)
  app.use((_, res, next) => {
    res.set('Cache-Control', 'no-store')
    next()
  })

  app.use(helmet())

  const allowedOrigins = env.CORS_ALLOWED_ORIGINS
    ? env.CORS_ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
    : DEFAULT_ALLOWED_ORIGINS

  app.use(
    cors({
      origin: (origin, callback) => {
        // Same-origin and non-browser callers send no Origin header
        if (!origin) {
          return callback(null, true)
        }
        if (allowedOrigins.includes(origin)) {
          callback(null, true)
        } else {
          logger.warn({ origin, allowedOrigins }, 'CORS request from disallowed origin')
          callback(null, false)
        }
      },
      credentials: true,
      methods: ['GET', 'POST', 'PATCH', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'Authorization'],
      optionsSuccessStatus: 204
    })
  )
  app.use(httpLogger)

  app.use(express.json({ limit: '64kb' }))
  app.use(express.urlencoded({ extended: false, limit: '64kb' }))

  app.use('/api/contact', buildContactRouter(contact))
  app.use('/api/admin/contact', buildContactAdminRouter(contact))

  app.get('/healthz', healthHandler)
  app.get('/readyz', readinessHandler)

  app.use((req, _res, next) => {
    next(new ApiHttpError(ApiErrorCode.NOT_FOUND, 'Resource not found', { status: 404, details: { path: req.path } }))
  })

  app.use(apiErrorHandler)

  return app
}
