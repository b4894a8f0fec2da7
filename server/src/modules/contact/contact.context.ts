import { env } from '../../config/env'
import { ChallengeSessionStore } from './challenge-session.store'
import { RecaptchaVerifier, type ChallengeVerifier } from './challenge-verifier'
import { ContactMessageRepository } from './contact-message.repository'
import { LoggingContactNotifier, type ContactNotifier } from './contact-notifier'
import { ContactPipeline, type ContactPipelineConfig } from './contact-pipeline'
import { ContactService } from './contact.service'
import { RetentionService } from './retention.service'
import { SubmissionAttemptRepository, type SubmissionAttemptStore } from './submission-attempt.repository'
import { SubmissionLogger } from './submission-logger'

/** Everything the contact routes need, built once per app. */
export interface ContactContext {
  clock: () => Date
  formEnabled: boolean
  attempts: SubmissionAttemptStore
  messages: ContactMessageRepository
  challenges: ChallengeSessionStore
  /** Null when no challenge provider is configured. */
  verifier: ChallengeVerifier | null
  notifier: ContactNotifier
  pipeline: ContactPipeline
  service: ContactService
  retention: RetentionService
}

export type ContactContextOptions = Partial<Omit<ContactContext, 'pipeline' | 'service' | 'retention'>> & {
  pipelineConfig?: Partial<ContactPipelineConfig>
  retentionDays?: number
}

export function createContactContext(options: ContactContextOptions = {}): ContactContext {
  const clock = options.clock ?? (() => new Date())
  const attempts = options.attempts ?? new SubmissionAttemptRepository()
  const messages = options.messages ?? new ContactMessageRepository()
  const challenges = options.challenges ?? new ChallengeSessionStore(env.CHALLENGE_SESSION_TTL_MS)
  const notifier = options.notifier ?? new LoggingContactNotifier()
  const verifier =
    options.verifier !== undefined
      ? options.verifier
      : env.RECAPTCHA_SECRET_KEY
        ? new RecaptchaVerifier(env.RECAPTCHA_SECRET_KEY, env.RECAPTCHA_VERIFY_URL)
        : null

  const pipeline = new ContactPipeline(
    attempts,
    {
      challengePolicy: { maxAgeMs: env.CHALLENGE_MAX_AGE_MS, minAgeMs: env.CHALLENGE_MIN_AGE_MS },
      requireChallenge: env.CONTACT_REQUIRE_CHALLENGE,
      spamThreshold: env.SPAM_THRESHOLD,
      ...options.pipelineConfig
    },
    clock
  )

  return {
    clock,
    formEnabled: options.formEnabled ?? env.CONTACT_FORM_ENABLED,
    attempts,
    messages,
    challenges,
    verifier,
    notifier,
    pipeline,
    service: new ContactService({ pipeline, messages, notifier, challenges, clock }),
    retention: new RetentionService(
      new SubmissionLogger(attempts),
      options.retentionDays ?? env.SUBMISSION_LOG_RETENTION_DAYS
    )
  }
}
