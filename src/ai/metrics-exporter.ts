// ---------------------------------------------------------------------------
// Metrics Exporter — prom-client counters/histograms fed by performance records
// ---------------------------------------------------------------------------

import { Counter, Gauge, Histogram, Registry } from 'prom-client'
import type { ModelHealthState } from './circuit-breaker'
import type { MetricsExporter, PerformanceRecord } from './performance-monitor'

const CIRCUIT_STATE_VALUE = { closed: 0, 'half-open': 1, open: 2 } as const

/**
 * Owns its own Registry so several conductors (or tests) in one process
 * never collide on metric names. Serve `metrics()` from an external endpoint.
 */
export class PromMetricsExporter implements MetricsExporter {
  readonly registry: Registry
  private requests: Counter<'subject' | 'category' | 'outcome'>
  private latency: Histogram<'subject' | 'category'>
  private circuit: Gauge<'model'>

  constructor(prefix = 'conductor_') {
    this.registry = new Registry()

    this.requests = new Counter({
      name: `${prefix}invocations_total`,
      help: 'Model invocations and synthesized queries by outcome',
      labelNames: ['subject', 'category', 'outcome'],
      registers: [this.registry]
    })

    this.latency = new Histogram({
      name: `${prefix}latency_seconds`,
      help: 'Latency of model invocations and synthesized queries',
      labelNames: ['subject', 'category'],
      buckets: [0.1, 0.3, 0.5, 1, 2, 5, 10, 30, 60],
      registers: [this.registry]
    })

    this.circuit = new Gauge({
      name: `${prefix}circuit_state`,
      help: 'Circuit state per model (0 closed, 1 half-open, 2 open)',
      labelNames: ['model'],
      registers: [this.registry]
    })
  }

  observe(record: PerformanceRecord): void {
    const labels = { subject: record.subject, category: record.category }
    this.requests.inc({ ...labels, outcome: record.success ? 'success' : 'failure' })
    this.latency.observe(labels, record.latencyMs / 1000)
  }

  /** Mirror a health snapshot into the circuit gauge. */
  updateHealth(snapshot: Record<string, ModelHealthState>): void {
    for (const [model, health] of Object.entries(snapshot)) {
      this.circuit.set({ model }, CIRCUIT_STATE_VALUE[health.state])
    }
  }

  metrics(): Promise<string> {
    return this.registry.metrics()
  }

  get contentType(): string {
    return this.registry.contentType
  }
}
