// ---------------------------------------------------------------------------
// Model Registry — registered model clients, capability lookup, health table
// ---------------------------------------------------------------------------

import { createLogger, type Logger } from '../logger'
import {
  CircuitBreaker,
  type CircuitLease,
  type CircuitOptions,
  type ModelHealthState
} from './circuit-breaker'
import type { ModelClient, ModelProfile } from './model-interface'

interface Entry {
  client: ModelClient
  breaker: CircuitBreaker
}

export class ModelRegistry {
  /** Insertion order is declaration order; the router relies on it for tie-breaks. */
  private entries = new Map<string, Entry>()
  private log: Logger

  constructor(private readonly circuit: CircuitOptions) {
    this.log = createLogger('model-registry')
  }

  register(client: ModelClient): void {
    const id = client.profile.id
    if (this.entries.has(id)) {
      throw new Error(`Model "${id}" is already registered`)
    }
    this.entries.set(id, { client, breaker: new CircuitBreaker(this.circuit) })
  }

  get(id: string): ModelClient | undefined {
    return this.entries.get(id)?.client
  }

  profile(id: string): ModelProfile | undefined {
    return this.entries.get(id)?.client.profile
  }

  list(): ModelClient[] {
    return Array.from(this.entries.values(), (e) => e.client)
  }

  /** Models whose capability tags include the category, in declaration order. */
  capableModels(category: string): ModelClient[] {
    return this.list().filter((c) => c.profile.capabilities.includes(category))
  }

  // ---------------------------------------------------------------------------
  // Health
  // ---------------------------------------------------------------------------

  health(id: string): ModelHealthState {
    const entry = this.entries.get(id)
    if (!entry) throw new Error(`Model "${id}" is not registered`)
    return entry.breaker.snapshot()
  }

  healthSnapshot(): Record<string, ModelHealthState> {
    const snapshot: Record<string, ModelHealthState> = {}
    for (const [id, entry] of this.entries) {
      snapshot[id] = entry.breaker.snapshot()
    }
    return snapshot
  }

  isOpen(id: string): boolean {
    const entry = this.entries.get(id)
    return entry !== undefined && entry.breaker.snapshot().state === 'open'
  }

  acquire(id: string): CircuitLease {
    const entry = this.entries.get(id)
    if (!entry) return { granted: false, reason: 'open' }
    return entry.breaker.acquire()
  }

  /** Release a trial lease that never produced an outcome. */
  abandon(id: string): void {
    this.entries.get(id)?.breaker.abandon()
  }

  /** The only place circuit state changes. Synchronous, so concurrent outcomes never race. */
  recordOutcome(id: string, success: boolean, latencyMs: number, trial = false): void {
    const entry = this.entries.get(id)
    if (!entry) return
    const transition = entry.breaker.record(success, latencyMs, trial)
    if (transition) {
      const health = entry.breaker.snapshot()
      this.log.warn(
        { modelId: id, from: transition.from, to: transition.to, failures: health.consecutiveFailures },
        'circuit state changed'
      )
    }
  }
}
