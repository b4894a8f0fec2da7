import type { Request, Response, NextFunction } from 'express'
import { ZodError } from 'zod'
import { ApiErrorCode, getApiErrorDefinition } from '@shared/types'
import { logger } from '../logger'
import { failure } from '../utils/api-response'

export class ApiHttpError extends Error {
  code: ApiErrorCode | string
  status: number
  details?: Record<string, unknown>

  constructor(
    code: ApiErrorCode | string,
    message?: string,
    options?: {
      status?: number
      details?: Record<string, unknown>
      cause?: unknown
    }
  ) {
    const definition = getApiErrorDefinition(code)
    super(message ?? definition.defaultMessage, options?.cause ? { cause: options.cause } : undefined)
    this.name = 'ApiHttpError'
    this.code = code
    this.status = options?.status ?? definition.httpStatus
    this.details = options?.details
  }
}

interface NormalizedError {
  code: ApiErrorCode | string
  message: string
  status: number
  details?: Record<string, unknown>
}

const readField = (err: object, key: string): unknown =>
  key in err ? Reflect.get(err, key) : undefined

const normalizeError = (err: unknown): NormalizedError => {
  if (err instanceof ApiHttpError) {
    return {
      code: err.code,
      message: err.message,
      status: err.status,
      details: err.details
    }
  }

  if (err instanceof ZodError) {
    const definition = getApiErrorDefinition(ApiErrorCode.VALIDATION_FAILED)
    return {
      code: ApiErrorCode.VALIDATION_FAILED,
      message: definition.defaultMessage,
      status: definition.httpStatus,
      details: { issues: err.flatten() }
    }
  }

  // body-parser errors carry a numeric status (400 for bad JSON, 413 for oversized bodies)
  if (err && typeof err === 'object') {
    const status = readField(err, 'status')
    const message = readField(err, 'message')
    if (typeof status === 'number' && status >= 400 && status < 500) {
      return {
        code: ApiErrorCode.INVALID_REQUEST,
        message: typeof message === 'string' ? message : getApiErrorDefinition(ApiErrorCode.INVALID_REQUEST).defaultMessage,
        status
      }
    }
  }

  const definition = getApiErrorDefinition(ApiErrorCode.INTERNAL_ERROR)
  return {
    code: ApiErrorCode.INTERNAL_ERROR,
    message: err instanceof Error ? err.message : definition.defaultMessage,
    status: definition.httpStatus
  }
}

export const apiErrorHandler = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const normalized = normalizeError(err)
  const status = normalized.status

  const response = failure(normalized.code, normalized.message, {
    ...(normalized.details ?? {}),
    path: req.path
  })

  if (process.env.NODE_ENV !== 'production' && err instanceof Error && err.stack) {
    response.error.stack = err.stack
  }

  const logLevel = status >= 500 ? 'error' : 'warn'
  logger[logLevel]({ err, code: normalized.code, status, path: req.path }, 'API error response')

  if (res.headersSent) return
  res.status(status).json(response)
}
