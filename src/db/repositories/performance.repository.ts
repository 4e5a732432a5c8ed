import type { Database } from 'better-sqlite3'
import { createId } from '@paralleldrive/cuid2'
import { z } from 'zod'
import { StatementCache, parseRow, parseRows } from '../statement-cache'
import type { PerformanceRow } from '../schema'
import type { PerformanceRecord, PerformanceSink } from '../../ai/performance-monitor'

const performanceRow = z
  .object({
    id: z.string(),
    subject: z.string(),
    category: z.string(),
    latency_ms: z.number(),
    success: z.number(),
    recorded_at: z.number()
  })
  .transform(
    (r): PerformanceRow => ({
      id: r.id,
      subject: r.subject,
      category: r.category,
      latencyMs: r.latency_ms,
      success: r.success === 1,
      recordedAt: r.recorded_at
    })
  )

const summaryRow = z.object({
  subject: z.string(),
  count: z.number(),
  average_latency_ms: z.number(),
  success_rate: z.number()
})

export interface SubjectSummary {
  subject: string
  count: number
  averageLatencyMs: number
  successRate: number
}

/** Durable sink for the performance monitor. Writes are synchronous under better-sqlite3. */
export class PerformanceRepository implements PerformanceSink {
  private stmts: StatementCache

  constructor(db: Database) {
    this.stmts = new StatementCache(db)
  }

  write(record: PerformanceRecord): void {
    this.create(record)
  }

  create(record: PerformanceRecord): PerformanceRow {
    const id = createId()
    this.stmts
      .prepare(
        `INSERT INTO performance_records (id, subject, category, latency_ms, success, recorded_at)
         VALUES (?, ?, ?, ?, ?, ?)`
      )
      .run(id, record.subject, record.category, record.latencyMs, record.success ? 1 : 0, record.timestamp)

    return {
      id,
      subject: record.subject,
      category: record.category,
      latencyMs: record.latencyMs,
      success: record.success,
      recordedAt: record.timestamp
    }
  }

  get(id: string): PerformanceRow | undefined {
    return parseRow(
      performanceRow,
      this.stmts.prepare('SELECT * FROM performance_records WHERE id = ?').get(id)
    )
  }

  list(limit = 100, offset = 0): PerformanceRow[] {
    return parseRows(
      performanceRow,
      this.stmts
        .prepare('SELECT * FROM performance_records ORDER BY recorded_at DESC, rowid DESC LIMIT ? OFFSET ?')
        .all(limit, offset)
    )
  }

  listBySubject(subject: string, sinceMs = 0): PerformanceRow[] {
    return parseRows(
      performanceRow,
      this.stmts
        .prepare(
          'SELECT * FROM performance_records WHERE subject = ? AND recorded_at >= ? ORDER BY recorded_at DESC, rowid DESC'
        )
        .all(subject, sinceMs)
    )
  }

  /** Per-subject stats since a timestamp, busiest first. */
  summarize(sinceMs = 0): SubjectSummary[] {
    const rows = parseRows(
      summaryRow,
      this.stmts
        .prepare(
          `SELECT
            subject,
            COUNT(*) as count,
            AVG(latency_ms) as average_latency_ms,
            AVG(success) as success_rate
           FROM performance_records
           WHERE recorded_at >= ?
           GROUP BY subject
           ORDER BY count DESC, subject ASC`
        )
        .all(sinceMs)
    )
    return rows.map((r) => ({
      subject: r.subject,
      count: r.count,
      averageLatencyMs: r.average_latency_ms,
      successRate: r.success_rate
    }))
  }

  /** Delete records older than a given timestamp (retention). */
  deleteOlderThan(beforeMs: number): number {
    return this.stmts.prepare('DELETE FROM performance_records WHERE recorded_at < ?').run(beforeMs).changes
  }
}
