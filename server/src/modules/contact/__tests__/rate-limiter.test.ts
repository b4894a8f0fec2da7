import { beforeEach, describe, expect, it } from 'vitest'
import { getDb } from '../../../db/sqlite'
import { SubmissionAttemptRepository } from '../submission-attempt.repository'
import { SubmissionRateLimiter } from '../rate-limiter'

const now = new Date('2024-05-01T12:00:00.000Z')

describe('SubmissionRateLimiter', () => {
  const db = getDb()
  const repo = new SubmissionAttemptRepository(db)
  const limiter = new SubmissionRateLimiter(repo)

  const recordAttempt = (ipAddress: string, email: string | null, secondsAgo: number) =>
    repo.insert({
      ipAddress,
      email,
      outcome: 'accepted',
      userAgent: 'Mozilla/5.0',
      submittedAt: new Date(now.getTime() - secondsAgo * 1000)
    })

  beforeEach(() => {
    db.prepare('DELETE FROM submission_attempts').run()
  })

  it('allows a first submission with full headroom', () => {
    const { allowed, info } = limiter.check('203.0.113.1', 'jane@example.com', now)

    expect(allowed).toBe(true)
    expect(info.remaining).toEqual({ per_minute: 2, per_hour: 10, per_day: 50 })
    expect(info.resetTimes.per_minute).toBe('2024-05-01T12:01:00.000Z')
    expect(info.blockedUntil).toBeNull()
    expect(info.failedClosed).toBe(false)
  })

  it('blocks the third submission inside a minute', () => {
    recordAttempt('203.0.113.1', 'jane@example.com', 20)
    recordAttempt('203.0.113.1', 'jane@example.com', 10)

    const { allowed, info } = limiter.check('203.0.113.1', 'jane@example.com', now)

    expect(allowed).toBe(false)
    expect(info.violatedWindow).toBe('per_minute')
    expect(info.blockedUntil).toBe('2024-05-01T12:01:00.000Z')
    expect(info.remaining).toEqual({ per_minute: 0 })
  })

  it('counts attempts from other IPs that share the email', () => {
    recordAttempt('198.51.100.1', 'jane@example.com', 30)
    recordAttempt('198.51.100.2', 'jane@example.com', 15)

    expect(limiter.check('192.0.2.50', 'jane@example.com', now).allowed).toBe(false)

    const otherEmail = limiter.check('198.51.100.1', 'someone@example.com', now)
    expect(otherEmail.allowed).toBe(true)
    expect(otherEmail.info.remaining.per_minute).toBe(1)
  })

  it('counts by IP only when no email is given', () => {
    recordAttempt('198.51.100.1', 'jane@example.com', 30)

    expect(limiter.check('198.51.100.9', null, now).info.remaining.per_minute).toBe(2)
    expect(limiter.check('198.51.100.1', null, now).info.remaining.per_minute).toBe(1)
  })

  it('lets older attempts age out of the minute window', () => {
    recordAttempt('203.0.113.1', 'jane@example.com', 90)
    recordAttempt('203.0.113.1', 'jane@example.com', 80)

    const { allowed, info } = limiter.check('203.0.113.1', 'jane@example.com', now)

    expect(allowed).toBe(true)
    expect(info.remaining).toEqual({ per_minute: 2, per_hour: 8, per_day: 48 })
  })

  it('blocks on the hourly window once ten attempts accumulate', () => {
    for (let minute = 2; minute < 12; minute++) {
      recordAttempt('203.0.113.1', 'jane@example.com', minute * 60)
    }

    const { allowed, info } = limiter.check('203.0.113.1', 'jane@example.com', now)

    expect(allowed).toBe(false)
    expect(info.violatedWindow).toBe('per_hour')
    expect(info.blockedUntil).toBe('2024-05-01T13:00:00.000Z')
    expect(info.remaining).toEqual({ per_minute: 2, per_hour: 0 })
  })

  it('evaluates custom windows shortest first', () => {
    const custom = new SubmissionRateLimiter(repo, [
      { name: 'per_day', windowMs: 24 * 60 * 60 * 1000, max: 1 },
      { name: 'per_minute', windowMs: 60 * 1000, max: 5 }
    ])
    recordAttempt('203.0.113.1', null, 3600)

    const { allowed, info } = custom.check('203.0.113.1', null, now)

    expect(allowed).toBe(false)
    expect(info.violatedWindow).toBe('per_day')
    expect(info.remaining).toEqual({ per_minute: 5, per_day: 0 })
  })

  it('fails closed when the store is unavailable', () => {
    const broken = new SubmissionRateLimiter({
      countRecent: () => {
        throw new Error('database is locked')
      }
    })

    const { allowed, info } = broken.check('203.0.113.1', 'jane@example.com', now)

    expect(allowed).toBe(false)
    expect(info.failedClosed).toBe(true)
    expect(info.violatedWindow).toBeNull()
  })
})
