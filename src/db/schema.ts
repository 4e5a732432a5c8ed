import { sqliteTable, text, integer, real, index } from 'drizzle-orm/sqlite-core'

export const performanceRecords = sqliteTable(
  'performance_records',
  {
    id: text('id').primaryKey(),
    subject: text('subject').notNull(),
    category: text('category').notNull(),
    latencyMs: real('latency_ms').notNull(),
    success: integer('success', { mode: 'boolean' }).notNull(),
    recordedAt: integer('recorded_at').notNull()
  },
  (table) => [
    index('idx_performance_subject').on(table.subject, table.recordedAt),
    index('idx_performance_recorded').on(table.recordedAt)
  ]
)

export const secrets = sqliteTable('secrets', {
  id: text('id').primaryKey(),
  name: text('name').notNull().unique(),
  encryptedValue: text('encrypted_value').notNull(),
  provider: text('provider').notNull().default('aes-256-gcm'),
  createdAt: integer('created_at').notNull(),
  updatedAt: integer('updated_at').notNull()
})

// Inferred types
export type PerformanceRow = typeof performanceRecords.$inferSelect
export type NewPerformanceRow = typeof performanceRecords.$inferInsert
export type Secret = typeof secrets.$inferSelect
