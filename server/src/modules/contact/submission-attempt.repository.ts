import type Database from 'better-sqlite3'
import type { SubmissionAttempt, SubmissionOutcome } from '@shared/types'
import { getDb } from '../../db/sqlite'

type SubmissionAttemptRow = {
  id: number
  ip_address: string
  email: string | null
  submitted_at: string
  outcome: string
  user_agent: string
}

export interface NewSubmissionAttempt {
  ipAddress: string
  email: string | null
  outcome: SubmissionOutcome
  userAgent: string
  submittedAt: Date
}

/**
 * Persistence boundary for the submission audit log. The pipeline only ever
 * talks to this interface, so tests and alternative stores can stand in.
 */
export interface SubmissionAttemptStore {
  /** Attempts since `since` matching the IP or, when given, the email. Each row counts once. */
  countRecent(ipAddress: string, email: string | null, since: Date): number
  insert(attempt: NewSubmissionAttempt): SubmissionAttempt
  /** Deletes attempts strictly older than `cutoff`. */
  deleteOlderThan(cutoff: Date): number
  listRecent(limit: number): SubmissionAttempt[]
  countSince(since: Date, outcome?: SubmissionOutcome): number
}

function toOutcome(value: string): SubmissionOutcome {
  return value === 'accepted' ? 'accepted' : 'blocked'
}

function mapRow(row: SubmissionAttemptRow): SubmissionAttempt {
  return {
    id: row.id,
    ipAddress: row.ip_address,
    email: row.email,
    submittedAt: row.submitted_at,
    outcome: toOutcome(row.outcome),
    userAgent: row.user_agent
  }
}

export class SubmissionAttemptRepository implements SubmissionAttemptStore {
  private db: Database.Database

  constructor(db: Database.Database = getDb()) {
    this.db = db
  }

  countRecent(ipAddress: string, email: string | null, since: Date): number {
    const sinceIso = since.toISOString()
    const row = email
      ? this.db
          .prepare<[string, string, string], { count: number }>(
            `SELECT COUNT(*) AS count FROM submission_attempts
             WHERE submitted_at >= ? AND (ip_address = ? OR email = ?)`
          )
          .get(sinceIso, ipAddress, email)
      : this.db
          .prepare<[string, string], { count: number }>(
            'SELECT COUNT(*) AS count FROM submission_attempts WHERE submitted_at >= ? AND ip_address = ?'
          )
          .get(sinceIso, ipAddress)

    return row?.count ?? 0
  }

  insert(attempt: NewSubmissionAttempt): SubmissionAttempt {
    const submittedAt = attempt.submittedAt.toISOString()
    const result = this.db
      .prepare(
        `INSERT INTO submission_attempts (ip_address, email, submitted_at, outcome, user_agent)
         VALUES (?, ?, ?, ?, ?)`
      )
      .run(attempt.ipAddress, attempt.email, submittedAt, attempt.outcome, attempt.userAgent)

    return {
      id: Number(result.lastInsertRowid),
      ipAddress: attempt.ipAddress,
      email: attempt.email,
      submittedAt,
      outcome: attempt.outcome,
      userAgent: attempt.userAgent
    }
  }

  deleteOlderThan(cutoff: Date): number {
    const result = this.db
      .prepare('DELETE FROM submission_attempts WHERE submitted_at < ?')
      .run(cutoff.toISOString())
    return result.changes
  }

  listRecent(limit = 100): SubmissionAttempt[] {
    const rows = this.db
      .prepare<[number], SubmissionAttemptRow>(
        'SELECT * FROM submission_attempts ORDER BY submitted_at DESC, id DESC LIMIT ?'
      )
      .all(limit)
    return rows.map(mapRow)
  }

  countSince(since: Date, outcome?: SubmissionOutcome): number {
    const row = outcome
      ? this.db
          .prepare<[string, string], { count: number }>(
            'SELECT COUNT(*) AS count FROM submission_attempts WHERE submitted_at >= ? AND outcome = ?'
          )
          .get(since.toISOString(), outcome)
      : this.db
          .prepare<[string], { count: number }>(
            'SELECT COUNT(*) AS count FROM submission_attempts WHERE submitted_at >= ?'
          )
          .get(since.toISOString())
    return row?.count ?? 0
  }
}
