import type { RateLimitInfo, RateLimitWindow } from '@shared/types'
import { logger } from '../../logger'
import type { SubmissionAttemptStore } from './submission-attempt.repository'

export const DEFAULT_RATE_LIMIT_WINDOWS: readonly RateLimitWindow[] = [
  { name: 'per_minute', windowMs: 60 * 1000, max: 2 },
  { name: 'per_hour', windowMs: 60 * 60 * 1000, max: 10 },
  { name: 'per_day', windowMs: 24 * 60 * 60 * 1000, max: 50 }
]

export interface RateLimitDecision {
  allowed: boolean
  info: RateLimitInfo
}

/**
 * Store-backed limiter over several trailing windows.
 *
 * Attempts are counted per IP unioned with per email, so rotating either key
 * alone does not reset the count. Windows are evaluated shortest first and the
 * first one at its max decides. Count and insert are separate statements, so
 * concurrent requests from one client can overshoot a window by a small margin.
 */
export class SubmissionRateLimiter {
  private readonly windows: readonly RateLimitWindow[]

  constructor(
    private readonly store: Pick<SubmissionAttemptStore, 'countRecent'>,
    windows: readonly RateLimitWindow[] = DEFAULT_RATE_LIMIT_WINDOWS
  ) {
    this.windows = [...windows].sort((a, b) => a.windowMs - b.windowMs)
  }

  check(identity: string, email?: string | null, now: Date = new Date()): RateLimitDecision {
    const info: RateLimitInfo = {
      remaining: {},
      resetTimes: {},
      blockedUntil: null,
      violatedWindow: null,
      failedClosed: false
    }

    for (const window of this.windows) {
      const windowStart = new Date(now.getTime() - window.windowMs)
      const resetAt = new Date(now.getTime() + window.windowMs).toISOString()

      let count: number
      try {
        count = this.store.countRecent(identity, email || null, windowStart)
      } catch (error) {
        logger.error({ error, identity, window: window.name }, 'Rate limit lookup failed; denying submission')
        info.failedClosed = true
        return { allowed: false, info }
      }

      info.remaining[window.name] = Math.max(0, window.max - count)
      info.resetTimes[window.name] = resetAt

      if (count >= window.max) {
        info.blockedUntil = resetAt
        info.violatedWindow = window.name
        logger.warn({ identity, count, window: window.name }, 'Contact rate limit exceeded')
        return { allowed: false, info }
      }
    }

    return { allowed: true, info }
  }
}
