import type { SubmissionOutcome } from '@shared/types'
import { logger } from '../../logger'
import type { SubmissionAttemptStore } from './submission-attempt.repository'

export const MAX_USER_AGENT_LENGTH = 500
const DAY_MS = 24 * 60 * 60 * 1000

export class SubmissionLogger {
  constructor(private readonly store: SubmissionAttemptStore) {}

  /**
   * Append one audit record. Never throws; a store failure is logged and
   * reported as `false`.
   */
  log(
    identity: string,
    email: string | null | undefined,
    outcome: SubmissionOutcome,
    userAgent: string | null | undefined,
    at: Date = new Date()
  ): boolean {
    try {
      this.store.insert({
        ipAddress: identity,
        email: email || null,
        outcome,
        userAgent: (userAgent ?? '').slice(0, MAX_USER_AGENT_LENGTH),
        submittedAt: at
      })
      logger.info({ identity, email, outcome }, 'Logged contact submission attempt')
      return true
    } catch (error) {
      logger.error({ error, identity, outcome }, 'Failed to log contact submission attempt')
      return false
    }
  }

  /** Delete attempts strictly older than `days` before `now`. Returns the number removed. */
  purgeOlderThan(days: number, now: Date = new Date()): number {
    const cutoff = new Date(now.getTime() - days * DAY_MS)
    const deleted = this.store.deleteOlderThan(cutoff)
    logger.info({ deleted, days, cutoff: cutoff.toISOString() }, 'Purged old contact submission attempts')
    return deleted
  }
}
