import type { ContactMessage } from '@shared/types'
import { logger } from '../../logger'
import type { ChallengeSessionStore } from './challenge-session.store'
import type { ContactNotifier } from './contact-notifier'
import type { ContactCandidate, ContactDecision, ContactPipeline } from './contact-pipeline'
import type { ContactMessageRepository } from './contact-message.repository'
import { MAX_USER_AGENT_LENGTH } from './submission-logger'

export interface ContactSubmission extends Omit<ContactCandidate, 'challengeValidatedAt'> {
  /** Challenge session cookie value, when the visitor has one. */
  challengeSessionId?: string | null
}

export interface ContactSubmitResult {
  decision: ContactDecision
  message: ContactMessage | null
  /** False when a notification was due but the notifier failed. */
  notified: boolean
}

interface ContactServiceDeps {
  pipeline: ContactPipeline
  messages: ContactMessageRepository
  notifier: ContactNotifier
  challenges: ChallengeSessionStore
  clock?: () => Date
}

/**
 * Collaborator around the pipeline: resolves the session's challenge state,
 * stores accepted messages (spam included) and notifies for the non-spam ones.
 */
export class ContactService {
  constructor(private readonly deps: ContactServiceDeps) {}

  async submit(submission: ContactSubmission): Promise<ContactSubmitResult> {
    const { challengeSessionId, ...candidate } = submission
    const now = this.deps.clock ? this.deps.clock() : new Date()
    const challengeValidatedAt = challengeSessionId ? this.deps.challenges.get(challengeSessionId, now) : null

    const decision = this.deps.pipeline.evaluate({ ...candidate, challengeValidatedAt })

    if (decision.clearChallenge && challengeSessionId) {
      this.deps.challenges.clear(challengeSessionId)
    }

    if (decision.verdict === 'blocked') {
      return { decision, message: null, notified: false }
    }

    const message = this.deps.messages.create({
      name: candidate.name,
      email: candidate.email,
      subject: candidate.subject ?? null,
      message: candidate.message,
      ipAddress: candidate.identity,
      userAgent: (candidate.userAgent ?? '').slice(0, MAX_USER_AGENT_LENGTH),
      spamScore: decision.spamScore,
      isSpam: decision.isSpam
    })

    if (decision.isSpam) {
      return { decision, message, notified: false }
    }

    try {
      await this.deps.notifier.notify(message)
      return { decision, message, notified: true }
    } catch (error) {
      logger.error({ error, messageId: message.id }, 'Contact notification failed; message kept')
      return { decision, message, notified: false }
    }
  }
}
