import { beforeEach, describe, expect, it, vi, type Mock } from 'vitest'
import { getDb } from '../../../db/sqlite'
import { ChallengeSessionStore } from '../challenge-session.store'
import { ContactMessageRepository } from '../contact-message.repository'
import type { ContactNotifier } from '../contact-notifier'
import { ContactPipeline } from '../contact-pipeline'
import { ContactService, type ContactSubmission } from '../contact.service'
import { SubmissionAttemptRepository } from '../submission-attempt.repository'

const BROWSER_UA = 'Mozilla/5.0 (X11; Linux x86_64; rv:127.0) Gecko/20100101 Firefox/127.0'

describe('ContactService', () => {
  const db = getDb()
  const now = new Date('2024-05-01T12:00:00.000Z')
  const clock = () => now
  const messages = new ContactMessageRepository(db)
  let challenges: ChallengeSessionStore
  let notify: Mock<ContactNotifier['notify']>
  let service: ContactService

  const submission = (overrides: Partial<ContactSubmission> = {}): ContactSubmission => ({
    identity: '203.0.113.20',
    userAgent: BROWSER_UA,
    formFields: {},
    name: 'Jane Doe',
    email: 'jane.doe@example.com',
    subject: 'Question',
    message: 'Hello, could you tell me more about your consulting availability next month?',
    ...overrides
  })

  beforeEach(() => {
    db.prepare('DELETE FROM submission_attempts').run()
    db.prepare('DELETE FROM contact_messages').run()
    challenges = new ChallengeSessionStore(30 * 60 * 1000)
    notify = vi.fn<ContactNotifier['notify']>().mockResolvedValue(undefined)
    service = new ContactService({
      pipeline: new ContactPipeline(new SubmissionAttemptRepository(db), {}, clock),
      messages,
      notifier: { notify },
      challenges,
      clock
    })
  })

  it('stores an accepted message and sends a notification', async () => {
    const result = await service.submit(submission())

    expect(result.decision.verdict).toBe('accepted')
    expect(result.notified).toBe(true)
    expect(result.message).toMatchObject({
      name: 'Jane Doe',
      subject: 'Question',
      ipAddress: '203.0.113.20',
      userAgent: BROWSER_UA,
      isSpam: false,
      isRead: false
    })
    expect(notify).toHaveBeenCalledWith(result.message)
    expect(messages.count()).toBe(1)
  })

  it('stores spam without notifying', async () => {
    const result = await service.submit(
      submission({
        name: 'WIN BIG',
        email: 'winner99999@example.com',
        message: 'CLICK HERE!!! Cheap viagra, bitcoin, casino, forex, loan $500 https://spam.example nowwwww'
      })
    )

    expect(result.decision.verdict).toBe('accepted_as_spam')
    expect(result.message?.isSpam).toBe(true)
    expect(result.notified).toBe(false)
    expect(notify).not.toHaveBeenCalled()
    expect(messages.counts()).toEqual({ total: 1, unread: 1, spam: 1 })
  })

  it('stores nothing for a blocked submission', async () => {
    const result = await service.submit(submission({ userAgent: 'curl/8.4.0' }))

    expect(result).toMatchObject({ message: null, notified: false })
    expect(result.decision).toMatchObject({ verdict: 'blocked', reason: 'suspicious_user_agent' })
    expect(messages.count()).toBe(0)
  })

  it('keeps the message when the notifier fails', async () => {
    notify.mockRejectedValueOnce(new Error('SMTP connection refused'))

    const result = await service.submit(submission())

    expect(result.decision.verdict).toBe('accepted')
    expect(result.notified).toBe(false)
    expect(result.message).not.toBeNull()
    expect(messages.count()).toBe(1)
  })

  it('truncates the stored user agent', async () => {
    const longAgent = `Mozilla/5.0 ${'x'.repeat(600)}`

    const result = await service.submit(submission({ userAgent: longAgent }))

    expect(result.message?.userAgent).toBe(longAgent.slice(0, 500))
  })

  it('consumes the session challenge once it authorised a message', async () => {
    challenges.record('session-1', new Date(now.getTime() - 60_000))

    const result = await service.submit(submission({ challengeSessionId: 'session-1' }))

    expect(result.decision).toMatchObject({ verdict: 'accepted', clearChallenge: true })
    expect(challenges.get('session-1', now)).toBeNull()
  })

  it('drops a challenge that was used too quickly', async () => {
    challenges.record('session-2', new Date(now.getTime() - 500))

    const result = await service.submit(submission({ challengeSessionId: 'session-2' }))

    expect(result.decision).toMatchObject({ verdict: 'blocked', reason: 'challenge_too_fast' })
    expect(challenges.get('session-2', now)).toBeNull()
    expect(messages.count()).toBe(0)
  })
})
