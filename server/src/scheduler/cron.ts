import cron, { type ScheduledTask } from 'node-cron'
import { logger } from '../logger'
import { env } from '../config/env'
import { RetentionService, type RetentionResult } from '../modules/contact/retention.service'
import { SubmissionAttemptRepository } from '../modules/contact/submission-attempt.repository'
import { SubmissionLogger } from '../modules/contact/submission-logger'

const getRetentionService = (() => {
  let svc: RetentionService | null = null
  return () => {
    if (!svc) {
      svc = new RetentionService(
        new SubmissionLogger(new SubmissionAttemptRepository()),
        env.SUBMISSION_LOG_RETENTION_DAYS
      )
    }
    return svc
  }
})()

export function runSubmissionLogPurge(service: RetentionService = getRetentionService()): RetentionResult {
  const result = service.runPurge()
  if (result.success) {
    logger.info({ deleted: result.deleted, cutoff: result.cutoff }, 'Cron purged submission log')
  } else {
    logger.error({ error: result.error }, 'Cron submission log purge failed')
  }
  return result
}

let purgeTask: ScheduledTask | null = null

export function getCronStatus() {
  return {
    enabled: env.CRON_ENABLED,
    started: purgeTask !== null,
    nodeEnv: env.NODE_ENV,
    expressions: {
      purge: env.CRON_PURGE_EXPRESSION
    },
    retentionDays: env.SUBMISSION_LOG_RETENTION_DAYS
  }
}

export function startCronScheduler() {
  logger.info(
    {
      NODE_ENV: env.NODE_ENV,
      CRON_ENABLED: env.CRON_ENABLED,
      CRON_PURGE_EXPRESSION: env.CRON_PURGE_EXPRESSION
    },
    'Cron scheduler config'
  )

  if (env.NODE_ENV !== 'production') {
    logger.info('Cron scheduler skipped outside production environment')
    return
  }

  if (!env.CRON_ENABLED) {
    logger.info('Cron scheduler disabled; set CRON_ENABLED=true to enable')
    return
  }

  if (!cron.validate(env.CRON_PURGE_EXPRESSION)) {
    throw new Error(`Invalid CRON_PURGE_EXPRESSION: ${env.CRON_PURGE_EXPRESSION}`)
  }

  if (purgeTask) return

  purgeTask = cron.schedule(
    env.CRON_PURGE_EXPRESSION,
    () => {
      runSubmissionLogPurge()
    },
    { timezone: 'UTC' }
  )

  logger.info({ purge: env.CRON_PURGE_EXPRESSION }, 'Cron scheduler started')
}

export function stopCronScheduler() {
  if (!purgeTask) return
  purgeTask.stop()
  purgeTask = null
}
