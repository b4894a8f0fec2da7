import { randomUUID } from 'node:crypto'
import type { Request, Response } from 'express'
import { parse as parseCookie } from 'cookie'
import { env } from '../config/env'

export const CHALLENGE_COOKIE = 'cs_challenge'
const IS_DEV_OR_TEST = env.NODE_ENV === 'development' || env.NODE_ENV === 'test'

function cookieOptions() {
  return {
    httpOnly: true,
    secure: !IS_DEV_OR_TEST,
    sameSite: 'lax' as const,
    path: '/'
  }
}

export function readChallengeSessionId(req: Request): string | null {
  const header = req.headers.cookie
  if (!header) return null
  return parseCookie(header)[CHALLENGE_COOKIE] || null
}

/** Issues a new challenge session id and sets it as the challenge cookie. */
export function issueChallengeSession(res: Response): string {
  const sessionId = randomUUID()
  res.cookie(CHALLENGE_COOKIE, sessionId, { ...cookieOptions(), maxAge: env.CHALLENGE_SESSION_TTL_MS })
  return sessionId
}

export function clearChallengeCookie(res: Response) {
  res.clearCookie(CHALLENGE_COOKIE, cookieOptions())
}
