import Database from 'better-sqlite3'
import { SCHEMA } from './schema.ts'
import { mkdirSync } from 'node:fs'
import { dirname } from 'node:path'

export type Db = Database.Database

export const DEFAULT_LOCK_TIMEOUT_MS = 10_000

/**
 * Opens (creating if needed) the SQLite file and applies the schema.
 * `lockTimeoutMs` is the busy timeout: how long a write waits for another
 * connection's lock before failing with SQLITE_BUSY.
 */
export function createDb(path: string, lockTimeoutMs = DEFAULT_LOCK_TIMEOUT_MS): Db {
  if (path !== ':memory:') {
    mkdirSync(dirname(path), { recursive: true })
  }
  const db = new Database(path, { timeout: lockTimeoutMs })
  db.pragma('journal_mode = WAL')
  db.exec(SCHEMA)
  return db
}
