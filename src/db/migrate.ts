import type { Database } from 'better-sqlite3'

interface Migration {
  name: string
  sql: string
}

const MIGRATIONS: Migration[] = [
  {
    name: '0001_performance_records.sql',
    sql: `
      CREATE TABLE IF NOT EXISTS performance_records (
        id          TEXT PRIMARY KEY,
        subject     TEXT NOT NULL,
        category    TEXT NOT NULL,
        latency_ms  REAL NOT NULL,
        success     INTEGER NOT NULL,
        recorded_at INTEGER NOT NULL
      );
      CREATE INDEX IF NOT EXISTS idx_performance_subject ON performance_records(subject, recorded_at);
      CREATE INDEX IF NOT EXISTS idx_performance_recorded ON performance_records(recorded_at);
    `
  },
  {
    name: '0002_secrets.sql',
    sql: `
      CREATE TABLE IF NOT EXISTS secrets (
        id              TEXT PRIMARY KEY,
        name            TEXT NOT NULL UNIQUE,
        encrypted_value TEXT NOT NULL,
        provider        TEXT NOT NULL DEFAULT 'aes-256-gcm',
        created_at      INTEGER NOT NULL,
        updated_at      INTEGER NOT NULL
      );
    `
  }
]

/** Apply every migration not yet recorded in `_migrations`, each in its own transaction. */
export function runMigrations(db: Database): string[] {
  db.exec(`
    CREATE TABLE IF NOT EXISTS _migrations (
      id INTEGER PRIMARY KEY AUTOINCREMENT,
      name TEXT NOT NULL UNIQUE,
      applied_at INTEGER NOT NULL
    )
  `)

  const apply = db.transaction((name: string, sql: string) => {
    db.exec(sql)
    db.prepare('INSERT INTO _migrations (name, applied_at) VALUES (?, ?)').run(name, Date.now())
  })

  const isApplied = db.prepare('SELECT 1 FROM _migrations WHERE name = ?').pluck()
  const applied: string[] = []

  for (const migration of MIGRATIONS) {
    if (isApplied.get(migration.name) === undefined) {
      apply(migration.name, migration.sql)
      applied.push(migration.name)
    }
  }
  return applied
}
