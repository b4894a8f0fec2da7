import type {
  ContactBlockReason,
  RateLimitInfo,
  RateLimitWindow,
  SpamAnalysis
} from '@shared/types'
import { logger } from '../../logger'
import { isSuspiciousUserAgent } from './bot-user-agent'
import { checkChallengeFreshness, DEFAULT_CHALLENGE_POLICY, type ChallengeFreshnessPolicy } from './challenge-freshness'
import { fingerprintClient } from './client-identity'
import { HONEYPOT_FIELDS, findFilledHoneypotField } from './honeypot'
import { DEFAULT_RATE_LIMIT_WINDOWS, SubmissionRateLimiter } from './rate-limiter'
import { DEFAULT_SPAM_THRESHOLD, isSpamScore, SpamScorer } from './spam-scorer'
import type { SubmissionAttemptStore } from './submission-attempt.repository'
import { SubmissionLogger } from './submission-logger'

export type PipelineState =
  | 'START'
  | 'RATE_LIMIT_CHECK'
  | 'HONEYPOT_CHECK'
  | 'UA_CHECK'
  | 'FRESHNESS_CHECK'
  | 'SCORE'
  | 'LOGGED'
  | 'ACCEPTED'
  | 'ACCEPTED_AS_SPAM'
  | 'BLOCKED'

export interface ContactCandidate {
  identity: string
  userAgent: string | null | undefined
  /** Raw form body, used only for decoy inspection. */
  formFields: Readonly<Record<string, string | undefined>>
  /** When the caller's session last passed a human-verification challenge. */
  challengeValidatedAt?: Date | null
  name: string
  email: string
  subject?: string | null
  message: string
}

interface DecisionBase {
  /** States visited, START through the terminal state. */
  trace: PipelineState[]
  /** The caller must drop the session's challenge validation. */
  clearChallenge: boolean
  /** The audit record was written. */
  logged: boolean
}

export interface BlockedDecision extends DecisionBase {
  verdict: 'blocked'
  reason: ContactBlockReason
  /** Respond exactly as for an accepted message. */
  maskAsSuccess: boolean
  rateLimit: RateLimitInfo | null
}

export interface AcceptedDecision extends DecisionBase {
  verdict: 'accepted' | 'accepted_as_spam'
  spamScore: number
  isSpam: boolean
  analysis: SpamAnalysis
  rateLimit: RateLimitInfo
}

export type ContactDecision = BlockedDecision | AcceptedDecision

export interface ContactPipelineConfig {
  rateLimitWindows: readonly RateLimitWindow[]
  honeypotFields: readonly string[]
  challengePolicy: ChallengeFreshnessPolicy
  requireChallenge: boolean
  spamThreshold: number
  spamKeywords?: readonly string[]
}

export const DEFAULT_PIPELINE_CONFIG: ContactPipelineConfig = {
  rateLimitWindows: DEFAULT_RATE_LIMIT_WINDOWS,
  honeypotFields: HONEYPOT_FIELDS,
  challengePolicy: DEFAULT_CHALLENGE_POLICY,
  requireChallenge: false,
  spamThreshold: DEFAULT_SPAM_THRESHOLD
}

/**
 * Runs one contact submission through the abuse checks:
 * rate limit → honeypot → user agent → challenge freshness → spam score.
 *
 * The first failing check blocks. Scoring never blocks; it only decides
 * between `accepted` and `accepted_as_spam`. Exactly one audit record is
 * written per call. The pipeline keeps no state between calls beyond what it
 * writes to the attempt store.
 */
export class ContactPipeline {
  private readonly config: ContactPipelineConfig
  private readonly limiter: SubmissionRateLimiter
  private readonly submissionLogger: SubmissionLogger
  private readonly scorer: SpamScorer

  constructor(
    store: SubmissionAttemptStore,
    config: Partial<ContactPipelineConfig> = {},
    private readonly clock: () => Date = () => new Date()
  ) {
    this.config = { ...DEFAULT_PIPELINE_CONFIG, ...config }
    this.limiter = new SubmissionRateLimiter(store, this.config.rateLimitWindows)
    this.submissionLogger = new SubmissionLogger(store)
    this.scorer = new SpamScorer(this.config.spamKeywords)
  }

  evaluate(candidate: ContactCandidate): ContactDecision {
    const now = this.clock()
    const trace: PipelineState[] = ['START']
    const log = logger.child({
      identity: candidate.identity,
      fingerprint: fingerprintClient(candidate.identity, candidate.userAgent)
    })

    const block = (
      reason: ContactBlockReason,
      options: { maskAsSuccess?: boolean; rateLimit?: RateLimitInfo | null; clearChallenge?: boolean } = {}
    ): BlockedDecision => {
      const logged = this.submissionLogger.log(candidate.identity, candidate.email, 'blocked', candidate.userAgent, now)
      trace.push('LOGGED', 'BLOCKED')
      log.info({ verdict: 'blocked', reason }, 'Contact submission blocked')
      return {
        verdict: 'blocked',
        reason,
        maskAsSuccess: options.maskAsSuccess ?? false,
        rateLimit: options.rateLimit ?? null,
        clearChallenge: options.clearChallenge ?? false,
        logged,
        trace
      }
    }

    trace.push('RATE_LIMIT_CHECK')
    const rateLimit = this.limiter.check(candidate.identity, candidate.email, now)
    if (!rateLimit.allowed) {
      return block('rate_limit_exceeded', { rateLimit: rateLimit.info })
    }

    trace.push('HONEYPOT_CHECK')
    const decoy = findFilledHoneypotField(candidate.formFields, this.config.honeypotFields)
    if (decoy) {
      log.warn({ field: decoy }, 'Honeypot triggered')
      return block('honeypot_triggered', { maskAsSuccess: true, rateLimit: rateLimit.info })
    }

    trace.push('UA_CHECK')
    if (isSuspiciousUserAgent(candidate.userAgent)) {
      log.warn({ userAgent: candidate.userAgent ?? null }, 'Suspicious user agent')
      return block('suspicious_user_agent', { rateLimit: rateLimit.info })
    }

    trace.push('FRESHNESS_CHECK')
    const violation = checkChallengeFreshness(candidate.challengeValidatedAt, now, {
      policy: this.config.challengePolicy,
      required: this.config.requireChallenge
    })
    if (violation) {
      return block(violation, { rateLimit: rateLimit.info, clearChallenge: Boolean(candidate.challengeValidatedAt) })
    }

    trace.push('SCORE')
    const analysis = this.scorer.analyze(candidate)
    const isSpam = isSpamScore(analysis.score, this.config.spamThreshold)
    const verdict = isSpam ? 'accepted_as_spam' : 'accepted'

    const triggered = analysis.signals.filter((entry) => entry.triggered)
    if (analysis.score > 0.1) {
      log.info({ email: candidate.email, score: analysis.score, signals: triggered }, 'Spam analysis')
    } else {
      log.debug({ score: analysis.score, signals: triggered }, 'Spam analysis')
    }

    const logged = this.submissionLogger.log(candidate.identity, candidate.email, 'accepted', candidate.userAgent, now)
    trace.push('LOGGED', isSpam ? 'ACCEPTED_AS_SPAM' : 'ACCEPTED')
    log.info({ verdict, score: analysis.score }, 'Contact submission accepted')

    return {
      verdict,
      spamScore: analysis.score,
      isSpam,
      analysis,
      rateLimit: rateLimit.info,
      // One solved challenge authorises one message.
      clearChallenge: Boolean(candidate.challengeValidatedAt),
      logged,
      trace
    }
  }
}
