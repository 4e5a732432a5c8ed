// ---------------------------------------------------------------------------
// Performance Monitor — bounded latency/success log with windowed aggregates
// ---------------------------------------------------------------------------

import { createLogger, type Logger } from '../logger'
import { errorMessage } from './errors'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export const SYNTHESIS_SUBJECT = 'synthesis'

export interface PerformanceRecord {
  /** Model id, or "synthesis" for a whole query. */
  readonly subject: string
  readonly latencyMs: number
  readonly success: boolean
  readonly category: string
  readonly timestamp: number
  /** Stable error code of a failed call or query. */
  readonly errorCode?: string
}

export type PerformanceEntry = Omit<PerformanceRecord, 'timestamp'> & { timestamp?: number }

/** Durable destination for records. Failures are logged and otherwise ignored. */
export interface PerformanceSink {
  write(record: PerformanceRecord): void | Promise<void>
}

export interface MetricsExporter {
  observe(record: PerformanceRecord): void
}

export interface PerformanceStats {
  count: number
  averageLatencyMs: number
  successRate: number
}

export interface PerformanceAggregate extends PerformanceStats {
  byModel: Record<string, PerformanceStats>
  byCategory: Record<string, PerformanceStats>
  /** Failures per error code. */
  byError: Record<string, number>
}

export interface PerformanceMonitorOptions {
  maxRecords?: number
  sink?: PerformanceSink
  exporter?: MetricsExporter
  now?: () => number
}

// ---------------------------------------------------------------------------
// Monitor
// ---------------------------------------------------------------------------

export class PerformanceMonitor {
  private records: PerformanceRecord[] = []
  private maxRecords: number
  private now: () => number
  private log: Logger

  constructor(private options: PerformanceMonitorOptions = {}) {
    this.maxRecords = options.maxRecords ?? 1000
    this.now = options.now ?? Date.now
    this.log = createLogger('performance-monitor')
  }

  record(entry: PerformanceEntry): PerformanceRecord {
    const record: PerformanceRecord = Object.freeze({
      subject: entry.subject,
      latencyMs: entry.latencyMs,
      success: entry.success,
      category: entry.category,
      timestamp: entry.timestamp ?? this.now(),
      ...(entry.errorCode !== undefined ? { errorCode: entry.errorCode } : {})
    })

    this.records.push(record)
    if (this.records.length > this.maxRecords) {
      this.records.splice(0, this.records.length - this.maxRecords)
    }

    this.forward(record)
    return record
  }

  /** Stats over records newer than `windowMs`, or over everything retained. */
  aggregate(windowMs?: number): PerformanceAggregate {
    const inWindow = this.window(windowMs)
    const byModel = new Map<string, PerformanceRecord[]>()
    const byCategory = new Map<string, PerformanceRecord[]>()
    const byError: Record<string, number> = {}

    for (const r of inWindow) {
      if (r.subject !== SYNTHESIS_SUBJECT) push(byModel, r.subject, r)
      push(byCategory, r.category, r)
      if (!r.success && r.errorCode !== undefined) byError[r.errorCode] = (byError[r.errorCode] ?? 0) + 1
    }

    return {
      ...stats(inWindow),
      byModel: mapStats(byModel),
      byCategory: mapStats(byCategory),
      byError
    }
  }

  /** Average latency of a model's successful calls in the window, or null when unmeasured. */
  recentLatency(modelId: string, windowMs: number): number | null {
    const samples = this.window(windowMs).filter((r) => r.subject === modelId && r.success)
    if (samples.length === 0) return null
    return samples.reduce((sum, r) => sum + r.latencyMs, 0) / samples.length
  }

  list(): readonly PerformanceRecord[] {
    return this.records.slice()
  }

  size(): number {
    return this.records.length
  }

  private window(windowMs?: number): PerformanceRecord[] {
    if (windowMs === undefined) return this.records
    const since = this.now() - windowMs
    return this.records.filter((r) => r.timestamp >= since)
  }

  private forward(record: PerformanceRecord): void {
    const { sink, exporter } = this.options

    if (sink) {
      try {
        void Promise.resolve(sink.write(record)).catch((err: unknown) => {
          this.log.warn({ err: errorMessage(err), subject: record.subject }, 'performance sink write failed')
        })
      } catch (err) {
        this.log.warn({ err: errorMessage(err), subject: record.subject }, 'performance sink write failed')
      }
    }

    if (exporter) {
      try {
        exporter.observe(record)
      } catch (err) {
        this.log.warn({ err: errorMessage(err), subject: record.subject }, 'metrics export failed')
      }
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function push(groups: Map<string, PerformanceRecord[]>, key: string, r: PerformanceRecord): void {
  const list = groups.get(key)
  if (list) list.push(r)
  else groups.set(key, [r])
}

function stats(records: readonly PerformanceRecord[]): PerformanceStats {
  if (records.length === 0) return { count: 0, averageLatencyMs: 0, successRate: 0 }
  const latency = records.reduce((sum, r) => sum + r.latencyMs, 0)
  const ok = records.filter((r) => r.success).length
  return {
    count: records.length,
    averageLatencyMs: latency / records.length,
    successRate: ok / records.length
  }
}

function mapStats(groups: Map<string, PerformanceRecord[]>): Record<string, PerformanceStats> {
  const out: Record<string, PerformanceStats> = {}
  for (const [key, records] of groups) out[key] = stats(records)
  return out
}
