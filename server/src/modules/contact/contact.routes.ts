import { Router, type RequestHandler, type Response } from 'express'
import { z } from 'zod'
import {
  ApiErrorCode,
  formFieldsSchema,
  listContactMessagesQuerySchema,
  purgeSubmissionAttemptsSchema,
  submitContactSchema,
  verifyChallengeSchema
} from '@shared/types'
import type {
  ContactStatsResponse,
  DeleteContactMessageResponse,
  GetContactMessageResponse,
  ListContactMessagesResponse,
  ListSubmissionAttemptsResponse,
  MarkContactMessageReadResponse,
  PurgeSubmissionAttemptsResponse,
  SubmitContactResponse,
  VerifyChallengeResponse
} from '@shared/types'
import { env } from '../../config/env'
import { ApiHttpError } from '../../middleware/api-error'
import { buildAdminAuth } from '../../middleware/admin-auth'
import { rateLimit } from '../../middleware/rate-limit'
import { asyncHandler } from '../../utils/async-handler'
import { failure, pageMeta, success } from '../../utils/api-response'
import { clearChallengeCookie, issueChallengeSession, readChallengeSessionId } from '../../utils/cookie'
import { resolveClientIdentity } from './client-identity'
import type { ContactContext } from './contact.context'
import type { BlockedDecision } from './contact-pipeline'

const DAY_MS = 24 * 60 * 60 * 1000

export const CONTACT_RECEIVED_MESSAGE = "Thank you for your message! I'll get back to you soon."
export const CONTACT_PENDING_MESSAGE =
  'Thank you for your message! It has been saved and will be reviewed, though the notification is delayed.'

const attemptsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100)
})

function retryAfterSeconds(blockedUntil: string | null, now: Date): number {
  if (!blockedUntil) return 60
  return Math.max(1, Math.ceil((Date.parse(blockedUntil) - now.getTime()) / 1000))
}

function blockedError(decision: BlockedDecision, res: Response, now: Date): ApiHttpError {
  switch (decision.reason) {
    case 'rate_limit_exceeded': {
      if (decision.rateLimit?.failedClosed) {
        return new ApiHttpError(
          ApiErrorCode.SERVICE_UNAVAILABLE,
          'The contact form is temporarily unavailable. Please try again later.'
        )
      }
      const retryAfter = retryAfterSeconds(decision.rateLimit?.blockedUntil ?? null, now)
      res.setHeader('Retry-After', String(retryAfter))
      return new ApiHttpError(
        ApiErrorCode.RATE_LIMIT_EXCEEDED,
        'Too many messages sent. Please wait before trying again.',
        {
          details: {
            reason: decision.reason,
            window: decision.rateLimit?.violatedWindow ?? null,
            retryAfterSeconds: retryAfter
          }
        }
      )
    }
    case 'suspicious_user_agent':
      return new ApiHttpError(
        ApiErrorCode.FORBIDDEN,
        'Automated submissions are not accepted. Please use a regular web browser.',
        { details: { reason: decision.reason } }
      )
    case 'challenge_stale':
    case 'challenge_too_fast':
      return new ApiHttpError(
        ApiErrorCode.CHALLENGE_FAILED,
        'Please complete the verification again before sending your message.',
        { details: { reason: decision.reason } }
      )
    case 'honeypot_triggered':
      return new ApiHttpError(ApiErrorCode.INVALID_REQUEST)
  }
}

export function buildContactRouter(context: ContactContext) {
  const router = Router()

  router.post(
    '/challenge',
    rateLimit({ windowMs: 60_000, max: 20 }),
    asyncHandler(async (req, res) => {
      const verifier = context.verifier
      if (!verifier) {
        throw new ApiHttpError(ApiErrorCode.SERVICE_UNAVAILABLE, 'Human verification is not configured')
      }

      const { token } = verifyChallengeSchema.parse(req.body)
      const identity = resolveClientIdentity(req.headers, req.socket.remoteAddress)

      let valid: boolean
      try {
        valid = await verifier.verify(token, identity)
      } catch (error) {
        throw new ApiHttpError(ApiErrorCode.SERVICE_UNAVAILABLE, 'Human verification is unavailable, please retry', {
          cause: error
        })
      }
      if (!valid) {
        throw new ApiHttpError(ApiErrorCode.CHALLENGE_FAILED)
      }

      const previousSessionId = readChallengeSessionId(req)
      if (previousSessionId) context.challenges.clear(previousSessionId)

      const sessionId = issueChallengeSession(res)
      const validatedAt = context.clock()
      context.challenges.record(sessionId, validatedAt)

      const response: VerifyChallengeResponse = { validatedAt: validatedAt.toISOString() }
      res.json(success(response))
    })
  )

  router.post(
    '/',
    asyncHandler(async (req, res) => {
      if (!context.formEnabled) {
        throw new ApiHttpError(ApiErrorCode.SERVICE_UNAVAILABLE, 'The contact form is currently disabled')
      }

      const input = submitContactSchema.parse(req.body)
      const formFields = formFieldsSchema.parse(req.body)

      const challengeSessionId = readChallengeSessionId(req)
      const result = await context.service.submit({
        identity: resolveClientIdentity(req.headers, req.socket.remoteAddress),
        userAgent: req.get('user-agent') ?? null,
        formFields,
        name: input.name,
        email: input.email,
        subject: input.subject ?? null,
        message: input.message,
        challengeSessionId
      })

      const { decision } = result
      if (decision.clearChallenge && challengeSessionId) {
        clearChallengeCookie(res)
      }
      if (decision.verdict === 'blocked' && !decision.maskAsSuccess) {
        throw blockedError(decision, res, context.clock())
      }

      const pendingNotification = decision.verdict === 'accepted' && !result.notified
      const response: SubmitContactResponse = { received: true }
      res.json(success(response, pendingNotification ? CONTACT_PENDING_MESSAGE : CONTACT_RECEIVED_MESSAGE))
    })
  )

  return router
}

export function buildContactAdminRouter(
  context: ContactContext,
  auth: RequestHandler = buildAdminAuth(env.ADMIN_API_TOKEN)
) {
  const router = Router()
  router.use(auth)

  router.get(
    '/messages',
    asyncHandler((req, res) => {
      const query = listContactMessagesQuerySchema.parse(req.query)
      const filter = {
        spam: query.spam === undefined ? undefined : query.spam === 'true',
        unread: query.unread === undefined ? undefined : query.unread === 'true'
      }
      const messages = context.messages.list(query.limit, query.offset, filter)
      const total = context.messages.count(filter)
      const response: ListContactMessagesResponse = {
        messages,
        unread: context.messages.count({ unread: true }),
        pagination: pageMeta(query.limit, query.offset, messages.length, total)
      }
      res.json(success(response))
    })
  )

  router.get(
    '/messages/:id',
    asyncHandler((req, res) => {
      const message = context.messages.getById(req.params.id)
      if (!message) {
        res.status(404).json(failure(ApiErrorCode.NOT_FOUND, 'Message not found'))
        return
      }
      const response: GetContactMessageResponse = { message }
      res.json(success(response))
    })
  )

  router.patch(
    '/messages/:id/read',
    asyncHandler((req, res) => {
      const message = context.messages.markRead(req.params.id)
      if (!message) {
        res.status(404).json(failure(ApiErrorCode.NOT_FOUND, 'Message not found'))
        return
      }
      const response: MarkContactMessageReadResponse = { message }
      res.json(success(response))
    })
  )

  router.delete(
    '/messages/:id',
    asyncHandler((req, res) => {
      const deleted = context.messages.delete(req.params.id)
      if (!deleted) {
        res.status(404).json(failure(ApiErrorCode.NOT_FOUND, 'Message not found'))
        return
      }
      const response: DeleteContactMessageResponse = { messageId: req.params.id, deleted }
      res.json(success(response, 'Message deleted'))
    })
  )

  router.get(
    '/attempts',
    asyncHandler((req, res) => {
      const { limit } = attemptsQuerySchema.parse(req.query)
      const attempts = context.attempts.listRecent(limit)
      const response: ListSubmissionAttemptsResponse = { attempts, count: attempts.length }
      res.json(success(response))
    })
  )

  router.get(
    '/stats',
    asyncHandler((_req, res) => {
      const since = new Date(context.clock().getTime() - DAY_MS)
      const counts = context.messages.counts()
      const response: ContactStatsResponse = {
        attemptsLast24h: context.attempts.countSince(since),
        blockedLast24h: context.attempts.countSince(since, 'blocked'),
        messagesTotal: counts.total,
        messagesUnread: counts.unread,
        messagesSpam: counts.spam
      }
      res.json(success(response))
    })
  )

  router.post(
    '/maintenance/purge',
    asyncHandler((req, res) => {
      const { days } = purgeSubmissionAttemptsSchema.parse(req.body ?? {})
      const result = context.retention.runPurge(days, context.clock())
      if (!result.success) {
        throw new ApiHttpError(ApiErrorCode.DATABASE_ERROR, result.error ?? 'Submission log purge failed')
      }
      const response: PurgeSubmissionAttemptsResponse = { deleted: result.deleted, cutoff: result.cutoff }
      res.json(success(response))
    })
  )

  return router
}
