import { logger } from '../../logger'
import type { SubmissionLogger } from './submission-logger'

export interface RetentionResult {
  success: boolean
  deleted: number
  cutoff: string
  error?: string
}

const DAY_MS = 24 * 60 * 60 * 1000

export class RetentionService {
  constructor(
    private readonly submissionLogger: SubmissionLogger,
    private readonly defaultDays: number
  ) {}

  runPurge(days: number = this.defaultDays, now: Date = new Date()): RetentionResult {
    const cutoff = new Date(now.getTime() - days * DAY_MS).toISOString()
    logger.info({ days, cutoff }, 'Starting submission log purge')

    try {
      const deleted = this.submissionLogger.purgeOlderThan(days, now)
      return { success: true, deleted, cutoff }
    } catch (error) {
      logger.error({ error, days }, 'Submission log purge failed')
      return {
        success: false,
        deleted: 0,
        cutoff,
        error: error instanceof Error ? error.message : String(error)
      }
    }
  }
}
