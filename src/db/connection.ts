import Database, { type Database as DatabaseType } from 'better-sqlite3'
import { dirname } from 'path'
import { mkdirSync, existsSync } from 'fs'
import { runMigrations } from './migrate'

/**
 * Open (creating if needed) the SQLite file at `dbPath` and bring its schema
 * up to date. Pass ":memory:" for a throwaway database.
 */
export function openDatabase(dbPath: string): DatabaseType {
  if (dbPath !== ':memory:') {
    const dir = dirname(dbPath)
    if (!existsSync(dir)) mkdirSync(dir, { recursive: true })
  }

  const db = new Database(dbPath)

  // Performance pragmas
  db.pragma('journal_mode = WAL')
  db.pragma('synchronous = NORMAL')
  db.pragma('cache_size = -16000')
  db.pragma('temp_store = MEMORY')
  db.pragma('foreign_keys = ON')
  db.pragma('busy_timeout = 5000')

  runMigrations(db)

  return db
}

export function closeDatabase(db: DatabaseType): void {
  if (!db.open) return
  if (!db.memory) db.pragma('wal_checkpoint(TRUNCATE)')
  db.close()
}
