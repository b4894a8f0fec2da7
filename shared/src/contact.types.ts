/**
 * Contact submission domain types
 *
 * Shared between the contact API and any UI that renders the contact form or
 * the admin inbox.
 */

export type SubmissionOutcome = "accepted" | "blocked"

/**
 * One record per contact-form POST. Append-only; removed only by the
 * retention purge.
 */
export interface SubmissionAttempt {
  id: number
  ipAddress: string
  email: string | null
  submittedAt: string
  outcome: SubmissionOutcome
  userAgent: string
}

export interface ContactMessage {
  id: string
  name: string
  email: string
  subject: string | null
  message: string
  ipAddress: string
  userAgent: string
  spamScore: number
  isSpam: boolean
  isRead: boolean
  createdAt: string
}

export type ContactVerdict = "accepted" | "accepted_as_spam" | "blocked"

export type ContactBlockReason =
  | "rate_limit_exceeded"
  | "honeypot_triggered"
  | "suspicious_user_agent"
  | "challenge_stale"
  | "challenge_too_fast"

export type RateLimitWindowName = "per_minute" | "per_hour" | "per_day"

export interface RateLimitWindow {
  name: RateLimitWindowName
  windowMs: number
  max: number
}

export interface RateLimitInfo {
  /** Remaining submissions per evaluated window. */
  remaining: Partial<Record<RateLimitWindowName, number>>
  /** Instant (ISO) at which each evaluated window no longer holds the current attempt. */
  resetTimes: Partial<Record<RateLimitWindowName, string>>
  blockedUntil: string | null
  violatedWindow: RateLimitWindowName | null
  /** Set when the limiter denied because the attempt store could not be read. */
  failedClosed: boolean
}

export type SpamSignalName =
  | "spam_keywords"
  | "spam_patterns"
  | "very_short_message"
  | "very_long_message"
  | "numeric_email"
  | "repeated_chars"
  | "no_spaces"
  | "excessive_punctuation"

export interface SpamSignal {
  name: SpamSignalName
  triggered: boolean
  contribution: number
  /** Match count or ratio behind the contribution, when the signal has one. */
  measure?: number
}

export interface SpamAnalysis {
  score: number
  signals: SpamSignal[]
}
