import { z } from 'zod'
import { env } from '../config/env'
import { closeDb } from '../db/sqlite'
import { logger } from '../logger'
import { RetentionService } from '../modules/contact/retention.service'
import { SubmissionAttemptRepository } from '../modules/contact/submission-attempt.repository'
import { SubmissionLogger } from '../modules/contact/submission-logger'

const daysSchema = z.coerce.number().int().min(1)

function parseDaysArg(argv: readonly string[], fallback: number): number {
  const index = argv.indexOf('--days')
  if (index === -1) return fallback
  const parsed = daysSchema.safeParse(argv[index + 1])
  if (!parsed.success) {
    throw new Error(`--days expects a positive integer, got ${argv[index + 1] ?? 'nothing'}`)
  }
  return parsed.data
}

function main() {
  const days = parseDaysArg(process.argv.slice(2), env.SUBMISSION_LOG_RETENTION_DAYS)
  const service = new RetentionService(new SubmissionLogger(new SubmissionAttemptRepository()), days)

  try {
    const result = service.runPurge()
    if (!result.success) {
      logger.error({ error: result.error }, '[purge] failed')
      process.exitCode = 1
      return
    }
    console.log(`[purge] removed ${result.deleted} submission record(s) older than ${result.cutoff}`)
  } finally {
    closeDb()
  }
}

main()
