type ChallengeSession = {
  validatedAt: Date
  expiresAt: number
}

/**
 * Per-session record of the last solved human-verification challenge.
 * In-memory only: a restart simply asks visitors to solve the challenge again.
 * Not shared across instances.
 */
export class ChallengeSessionStore {
  private readonly sessions = new Map<string, ChallengeSession>()

  constructor(private readonly ttlMs: number) {}

  record(sessionId: string, validatedAt: Date = new Date()): void {
    this.prune(validatedAt.getTime())
    this.sessions.set(sessionId, { validatedAt, expiresAt: validatedAt.getTime() + this.ttlMs })
  }

  get(sessionId: string, now: Date = new Date()): Date | null {
    const session = this.sessions.get(sessionId)
    if (!session) return null
    if (session.expiresAt <= now.getTime()) {
      this.sessions.delete(sessionId)
      return null
    }
    return session.validatedAt
  }

  clear(sessionId: string): void {
    this.sessions.delete(sessionId)
  }

  get size(): number {
    return this.sessions.size
  }

  // Bounded sweep of expired sessions per write
  private prune(now: number): void {
    let pruned = 0
    for (const [id, session] of this.sessions) {
      if (session.expiresAt <= now) {
        this.sessions.delete(id)
        pruned++
        if (pruned >= 10) break
      }
    }
  }
}
