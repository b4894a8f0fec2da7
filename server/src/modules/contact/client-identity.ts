import { createHash } from 'node:crypto'
import type { IncomingHttpHeaders } from 'node:http'

export const LOOPBACK_IDENTITY = '127.0.0.1'

function headerValue(value: string | string[] | undefined): string | undefined {
  return Array.isArray(value) ? value[0] : value
}

/**
 * Resolve the client IP used to key rate limiting.
 *
 * Order: leftmost X-Forwarded-For hop, then X-Real-IP, then the socket peer,
 * then the loopback sentinel. Headers are trusted as-is; the reverse proxy in
 * front of the API is expected to overwrite or strip them.
 */
export function resolveClientIdentity(headers: IncomingHttpHeaders, remoteAddress?: string | null): string {
  const forwarded = headerValue(headers['x-forwarded-for'])
  if (forwarded) {
    const original = forwarded.split(',')[0]?.trim()
    if (original) return original
  }

  const realIp = headerValue(headers['x-real-ip'])?.trim()
  if (realIp) return realIp

  return remoteAddress || LOOPBACK_IDENTITY
}

/** Short stable hash of IP + user agent, used to correlate log lines. */
export function fingerprintClient(identity: string, userAgent: string | null | undefined): string {
  return createHash('sha256').update(`${identity}:${userAgent ?? ''}`).digest('hex').slice(0, 16)
}
