import path from 'node:path'
import sqlite3 from 'better-sqlite3'
import { DEFAULT_MIGRATIONS_DIR, runMigrations } from '../db/migrations'

const DB_PATH = process.env.DATABASE_PATH ?? path.resolve(process.cwd(), 'infra/sqlite/contact.db')

const MIGRATIONS_DIR = process.env.MIGRATIONS_DIR ? path.resolve(process.env.MIGRATIONS_DIR) : DEFAULT_MIGRATIONS_DIR

function main() {
  const db = sqlite3(DB_PATH)
  try {
    const applied = runMigrations(db, MIGRATIONS_DIR)
    if (!applied.length) {
      console.log('[migrate] database already up to date')
    } else {
      console.log(`[migrate] applied ${applied.length} migration(s) to ${DB_PATH}`)
      for (const name of applied) {
        console.log(`[migrate] -> ${name}`)
      }
    }
  } finally {
    db.close()
  }
}

main()
