import type { PaginationMeta } from "../api.types"
import type { ContactMessage, SubmissionAttempt } from "../contact.types"

export interface SubmitContactRequest {
  name: string
  email: string
  subject?: string
  message: string
  /** Decoy fields are sent alongside the real ones and must stay empty. */
  [field: string]: string | undefined
}

/**
 * Public response for a submission. Accepted, spam-flagged and honeypot
 * submissions all produce the same body.
 */
export interface SubmitContactResponse {
  received: true
}

export interface VerifyChallengeRequest {
  token: string
}

export interface VerifyChallengeResponse {
  validatedAt: string
}

export interface ListContactMessagesResponse {
  messages: ContactMessage[]
  unread: number
  pagination: PaginationMeta
}

export interface GetContactMessageResponse {
  message: ContactMessage
}

export interface MarkContactMessageReadResponse {
  message: ContactMessage
}

export interface DeleteContactMessageResponse {
  messageId: string
  deleted: boolean
}

export interface ListSubmissionAttemptsResponse {
  attempts: SubmissionAttempt[]
  count: number
}

export interface ContactStatsResponse {
  attemptsLast24h: number
  blockedLast24h: number
  messagesTotal: number
  messagesUnread: number
  messagesSpam: number
}

export interface PurgeSubmissionAttemptsRequest {
  days?: number
}

export interface PurgeSubmissionAttemptsResponse {
  deleted: number
  cutoff: string
}
