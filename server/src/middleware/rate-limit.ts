import type { NextFunction, Request, Response } from 'express'
import { ApiErrorCode } from '@shared/types'
import { resolveClientIdentity } from '../modules/contact/client-identity'
import { failure } from '../utils/api-response'

type RateLimitOptions = {
  windowMs: number
  max: number
  keyGenerator?: (req: Request) => string | null | undefined
}

type Bucket = {
  expiresAt: number
  count: number
}

const clientKey = (req: Request) => resolveClientIdentity(req.headers, req.socket.remoteAddress)

/**
 * Fixed-window in-memory request limiter for cheap endpoints such as the
 * challenge verification route. Per process; the contact form itself is
 * limited by the persistent submission log instead.
 */
export function rateLimit(options: RateLimitOptions) {
  const buckets = new Map<string, Bucket>()
  const keyFor = options.keyGenerator ?? clientKey

  return function rateLimitMiddleware(req: Request, res: Response, next: NextFunction) {
    const key = keyFor(req)
    if (!key) return next()

    const now = Date.now()
    const bucket = buckets.get(key)

    if (bucket && bucket.expiresAt > now) {
      if (bucket.count >= options.max) {
        const retryAfterSeconds = Math.max(1, Math.ceil((bucket.expiresAt - now) / 1000))
        res.setHeader('Retry-After', String(retryAfterSeconds))
        res
          .status(429)
          .json(failure(ApiErrorCode.RATE_LIMIT_EXCEEDED, 'Too many requests, please slow down', { retryAfterSeconds }))
        return
      }
      bucket.count += 1
    } else {
      buckets.set(key, { count: 1, expiresAt: now + options.windowMs })
    }

    let pruned = 0
    for (const [k, b] of buckets) {
      if (b.expiresAt <= now) {
        buckets.delete(k)
        pruned++
        if (pruned >= 5) break
      }
    }

    next()
  }
}
