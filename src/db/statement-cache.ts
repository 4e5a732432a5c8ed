import type { Statement, Database } from 'better-sqlite3'
import type { ZodTypeAny, output } from 'zod'

export class StatementCache {
  private cache = new Map<string, Statement>()

  constructor(private db: Database) {}

  prepare(sql: string): Statement {
    let stmt = this.cache.get(sql)
    if (!stmt) {
      stmt = this.db.prepare(sql)
      this.cache.set(sql, stmt)
    }
    return stmt
  }

  size(): number {
    return this.cache.size
  }

  invalidate(): void {
    this.cache.clear()
  }
}

/**
 * Validate a snake_case row from SQLite into the camelCase shape of the
 * matching Drizzle inferred type. `undefined` (no row) passes through.
 */
export function parseRow<S extends ZodTypeAny>(schema: S, row: unknown): output<S> | undefined {
  if (row === undefined) return undefined
  return schema.parse(row)
}

export function parseRows<S extends ZodTypeAny>(schema: S, rows: unknown[]): Array<output<S>> {
  return rows.map((r) => schema.parse(r))
}
