import * as crypto from 'crypto'
import type { NextFunction, Request, Response } from 'express'
import { ApiErrorCode } from '@shared/types'
import { ApiHttpError } from './api-error'

function tokensMatch(candidate: string, expected: string): boolean {
  const a = Buffer.from(candidate)
  const b = Buffer.from(expected)
  return a.length === b.length && crypto.timingSafeEqual(a, b)
}

/**
 * Bearer-token guard for the contact inbox and maintenance endpoints.
 * Closed when no token is configured.
 */
export function buildAdminAuth(expectedToken: string | undefined) {
  return function verifyAdminToken(req: Request, _res: Response, next: NextFunction) {
    if (!expectedToken) {
      return next(new ApiHttpError(ApiErrorCode.SERVICE_UNAVAILABLE, 'Admin API is not configured', { status: 503 }))
    }

    const authHeader = req.headers.authorization
    if (!authHeader?.startsWith('Bearer ')) {
      return next(new ApiHttpError(ApiErrorCode.UNAUTHORIZED, 'Missing Authorization header', { status: 401 }))
    }

    const token = authHeader.slice('Bearer '.length)
    if (!tokensMatch(token, expectedToken)) {
      return next(new ApiHttpError(ApiErrorCode.INVALID_TOKEN, 'Invalid admin token', { status: 401 }))
    }

    return next()
  }
}
