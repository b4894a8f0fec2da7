export interface ChallengeFreshnessPolicy {
  /** Oldest acceptable validation, in ms before the submission. */
  maxAgeMs: number
  /** Minimum plausible gap between solving the challenge and submitting. */
  minAgeMs: number
}

export const DEFAULT_CHALLENGE_POLICY: ChallengeFreshnessPolicy = {
  maxAgeMs: 5 * 60 * 1000,
  minAgeMs: 2000
}

export type ChallengeViolation = 'challenge_stale' | 'challenge_too_fast'

export function isChallengeFresh(
  lastValidation: Date,
  now: Date,
  policy: ChallengeFreshnessPolicy = DEFAULT_CHALLENGE_POLICY
): boolean {
  return now.getTime() - lastValidation.getTime() <= policy.maxAgeMs
}

export function isChallengeTooFast(
  lastValidation: Date,
  now: Date,
  policy: ChallengeFreshnessPolicy = DEFAULT_CHALLENGE_POLICY
): boolean {
  return now.getTime() - lastValidation.getTime() < policy.minAgeMs
}

/**
 * Returns the violated rule, or null when the validation may be used.
 * A missing validation counts as stale when a challenge is required and is
 * ignored otherwise.
 */
export function checkChallengeFreshness(
  lastValidation: Date | null | undefined,
  now: Date,
  options: { policy?: ChallengeFreshnessPolicy; required?: boolean } = {}
): ChallengeViolation | null {
  const policy = options.policy ?? DEFAULT_CHALLENGE_POLICY
  if (!lastValidation) {
    return options.required ? 'challenge_stale' : null
  }
  if (!isChallengeFresh(lastValidation, now, policy)) return 'challenge_stale'
  if (isChallengeTooFast(lastValidation, now, policy)) return 'challenge_too_fast'
  return null
}
