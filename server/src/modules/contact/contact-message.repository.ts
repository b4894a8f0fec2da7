import { randomUUID } from 'node:crypto'
import type Database from 'better-sqlite3'
import type { ContactMessage } from '@shared/types'
import { getDb } from '../../db/sqlite'

type ContactMessageRow = {
  id: string
  name: string
  email: string
  subject: string | null
  message: string
  ip_address: string
  user_agent: string
  spam_score: number
  is_spam: number
  is_read: number
  created_at: string
}

export interface NewContactMessage {
  name: string
  email: string
  subject?: string | null
  message: string
  ipAddress: string
  userAgent: string
  spamScore: number
  isSpam: boolean
  createdAt?: Date
}

export interface ContactMessageFilter {
  spam?: boolean
  unread?: boolean
}

export interface ContactMessageCounts {
  total: number
  unread: number
  spam: number
}

function mapRow(row: ContactMessageRow): ContactMessage {
  return {
    id: row.id,
    name: row.name,
    email: row.email,
    subject: row.subject,
    message: row.message,
    ipAddress: row.ip_address,
    userAgent: row.user_agent,
    spamScore: row.spam_score,
    isSpam: row.is_spam === 1,
    isRead: row.is_read === 1,
    createdAt: row.created_at
  }
}

function buildWhere(filter: ContactMessageFilter): { clause: string; params: number[] } {
  const conditions: string[] = []
  const params: number[] = []
  if (filter.spam !== undefined) {
    conditions.push('is_spam = ?')
    params.push(filter.spam ? 1 : 0)
  }
  if (filter.unread !== undefined) {
    conditions.push('is_read = ?')
    params.push(filter.unread ? 0 : 1)
  }
  return {
    clause: conditions.length ? `WHERE ${conditions.join(' AND ')}` : '',
    params
  }
}

export class ContactMessageRepository {
  private db: Database.Database

  constructor(db: Database.Database = getDb()) {
    this.db = db
  }

  create(input: NewContactMessage): ContactMessage {
    const id = randomUUID()
    const createdAt = (input.createdAt ?? new Date()).toISOString()

    this.db
      .prepare(
        `INSERT INTO contact_messages (
          id, name, email, subject, message, ip_address, user_agent,
          spam_score, is_spam, is_read, created_at
        ) VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?, 0, ?)`
      )
      .run(
        id,
        input.name,
        input.email,
        input.subject ?? null,
        input.message,
        input.ipAddress,
        input.userAgent,
        input.spamScore,
        input.isSpam ? 1 : 0,
        createdAt
      )

    const created = this.getById(id)
    if (!created) {
      throw new Error(`Contact message ${id} was not persisted`)
    }
    return created
  }

  list(limit = 50, offset = 0, filter: ContactMessageFilter = {}): ContactMessage[] {
    const { clause, params } = buildWhere(filter)
    const rows = this.db
      .prepare<unknown[], ContactMessageRow>(
        `SELECT * FROM contact_messages ${clause} ORDER BY created_at DESC LIMIT ? OFFSET ?`
      )
      .all(...params, limit, offset)

    return rows.map(mapRow)
  }

  count(filter: ContactMessageFilter = {}): number {
    const { clause, params } = buildWhere(filter)
    const row = this.db
      .prepare<unknown[], { count: number }>(`SELECT COUNT(*) AS count FROM contact_messages ${clause}`)
      .get(...params)
    return row?.count ?? 0
  }

  counts(): ContactMessageCounts {
    const row = this.db
      .prepare<[], { total: number; unread: number | null; spam: number | null }>(
        `SELECT COUNT(*) AS total,
                SUM(CASE WHEN is_read = 0 THEN 1 ELSE 0 END) AS unread,
                SUM(CASE WHEN is_spam = 1 THEN 1 ELSE 0 END) AS spam
         FROM contact_messages`
      )
      .get()
    return {
      total: row?.total ?? 0,
      unread: row?.unread ?? 0,
      spam: row?.spam ?? 0
    }
  }

  getById(id: string): ContactMessage | null {
    const row = this.db
      .prepare<[string], ContactMessageRow>('SELECT * FROM contact_messages WHERE id = ?')
      .get(id)

    return row ? mapRow(row) : null
  }

  markRead(id: string): ContactMessage | null {
    this.db.prepare('UPDATE contact_messages SET is_read = 1 WHERE id = ?').run(id)
    return this.getById(id)
  }

  delete(id: string): boolean {
    const result = this.db.prepare('DELETE FROM contact_messages WHERE id = ?').run(id)
    return result.changes > 0
  }
}
