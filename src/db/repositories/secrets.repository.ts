import type { Database } from 'better-sqlite3'
import { createId } from '@paralleldrive/cuid2'
import { z } from 'zod'
import { StatementCache, parseRow, parseRows } from '../statement-cache'
import type { Secret } from '../schema'

const secretRow = z
  .object({
    id: z.string(),
    name: z.string(),
    encrypted_value: z.string(),
    provider: z.string(),
    created_at: z.number(),
    updated_at: z.number()
  })
  .transform(
    (r): Secret => ({
      id: r.id,
      name: r.name,
      encryptedValue: r.encrypted_value,
      provider: r.provider,
      createdAt: r.created_at,
      updatedAt: r.updated_at
    })
  )

const listRow = z.object({
  id: z.string(),
  name: z.string(),
  provider: z.string(),
  createdAt: z.number(),
  updatedAt: z.number()
})

export type SecretListItem = z.infer<typeof listRow>

export class SecretsRepository {
  private stmts: StatementCache

  constructor(db: Database) {
    this.stmts = new StatementCache(db)
  }

  getByName(name: string): Secret | undefined {
    return parseRow(secretRow, this.stmts.prepare('SELECT * FROM secrets WHERE name = ?').get(name))
  }

  list(): SecretListItem[] {
    return parseRows(
      listRow,
      this.stmts
        .prepare(
          'SELECT id, name, provider, created_at as createdAt, updated_at as updatedAt FROM secrets ORDER BY name ASC'
        )
        .all()
    )
  }

  create(data: { name: string; encryptedValue: string; provider?: string }): Secret {
    const now = Date.now()
    const id = createId()
    const provider = data.provider ?? 'aes-256-gcm'

    this.stmts
      .prepare(
        `INSERT INTO secrets (id, name, encrypted_value, provider, created_at, updated_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(id, data.name, data.encryptedValue, provider, now, now)

    return {
      id,
      name: data.name,
      encryptedValue: data.encryptedValue,
      provider,
      createdAt: now,
      updatedAt: now
    }
  }

  update(name: string, data: { encryptedValue: string }): Secret | undefined {
    const existing = this.getByName(name)
    if (!existing) return undefined

    const now = Date.now()
    this.stmts
      .prepare('UPDATE secrets SET encrypted_value = ?, updated_at = ? WHERE name = ?')
      .run(data.encryptedValue, now, name)

    return { ...existing, encryptedValue: data.encryptedValue, updatedAt: now }
  }

  delete(name: string): boolean {
    const result = this.stmts.prepare('DELETE FROM secrets WHERE name = ?').run(name)
    return result.changes > 0
  }
}
