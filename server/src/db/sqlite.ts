import Database from 'better-sqlite3'
import fs from 'node:fs'
import path from 'node:path'
import { env } from '../config/env'
import { logger } from '../logger'
import { DEFAULT_MIGRATIONS_DIR, runMigrations } from './migrations'

const IN_MEMORY_PATH = ':memory:'

let db: Database.Database | null = null
let migrationsApplied = false

export function getDb(): Database.Database {
  if (db) {
    return db
  }

  const isInMemory = env.DATABASE_PATH === IN_MEMORY_PATH
  const dbPath = isInMemory ? IN_MEMORY_PATH : path.resolve(env.DATABASE_PATH)

  if (!isInMemory && !fs.existsSync(path.dirname(dbPath))) {
    fs.mkdirSync(path.dirname(dbPath), { recursive: true })
  }

  logger.info({ dbPath }, 'Opening SQLite database')

  db = new Database(dbPath)
  db.pragma('journal_mode = WAL')
  db.pragma('busy_timeout = 15000')
  db.pragma('synchronous = NORMAL')

  if (!migrationsApplied) {
    try {
      runMigrations(db, env.MIGRATIONS_DIR ? path.resolve(env.MIGRATIONS_DIR) : DEFAULT_MIGRATIONS_DIR)
    } finally {
      // A failed migration is not retried on this connection; the next cold start will.
      migrationsApplied = true
    }
  }

  return db
}

export function closeDb(): void {
  if (!db) return
  logger.info('Closing SQLite database')
  db.close()
  db = null
  migrationsApplied = false
}
