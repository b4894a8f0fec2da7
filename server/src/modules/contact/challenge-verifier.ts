import { z } from 'zod'
import { logger } from '../../logger'

export interface ChallengeVerifier {
  /** Resolves true when the provider accepts the token. */
  verify(token: string, remoteIp: string): Promise<boolean>
}

const siteVerifyResponseSchema = z.object({
  success: z.boolean(),
  'error-codes': z.array(z.string()).optional()
})

/**
 * reCAPTCHA siteverify client. Network and provider errors are thrown to the
 * caller; a well-formed "not valid" answer resolves to false.
 */
export class RecaptchaVerifier implements ChallengeVerifier {
  constructor(
    private readonly secret: string,
    private readonly verifyUrl: string,
    private readonly timeoutMs = 5_000
  ) {}

  async verify(token: string, remoteIp: string): Promise<boolean> {
    const controller = new AbortController()
    const timeout = setTimeout(() => controller.abort(), this.timeoutMs)

    try {
      const res = await fetch(this.verifyUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: new URLSearchParams({ secret: this.secret, response: token, remoteip: remoteIp }).toString(),
        signal: controller.signal
      })
      if (!res.ok) {
        throw new Error(`reCAPTCHA verify HTTP ${res.status}`)
      }

      const payload = siteVerifyResponseSchema.parse(await res.json())
      if (!payload.success) {
        logger.warn({ errorCodes: payload['error-codes'] ?? [] }, 'reCAPTCHA token rejected')
      }
      return payload.success
    } finally {
      clearTimeout(timeout)
    }
  }
}
