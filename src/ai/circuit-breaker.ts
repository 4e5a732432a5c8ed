// ---------------------------------------------------------------------------
// Circuit Breaker — per-model health state with a single half-open trial
// ---------------------------------------------------------------------------

export type CircuitState = 'closed' | 'open' | 'half-open'

export interface ModelHealthState {
  state: CircuitState
  consecutiveFailures: number
  lastFailureAt: number | null
  cooldownUntil: number | null
  lastLatencyMs: number | null
}

export interface CircuitOptions {
  /** Consecutive failures that open the circuit. */
  failureThreshold: number
  /** How long an open circuit rejects calls before allowing one trial. */
  cooldownMs: number
  now?: () => number
}

export type CircuitLease =
  | { granted: true; trial: boolean }
  | { granted: false; reason: 'open' | 'trial-in-flight' }

export interface CircuitTransition {
  from: CircuitState
  to: CircuitState
}

export class CircuitBreaker {
  private state: 'closed' | 'open' = 'closed'
  private consecutiveFailures = 0
  private lastFailureAt: number | null = null
  private cooldownUntil: number | null = null
  private lastLatencyMs: number | null = null
  private trialInFlight = false
  private readonly now: () => number

  constructor(private readonly options: CircuitOptions) {
    this.now = options.now ?? Date.now
  }

  /** Current health as callers see it. An open circuit past its cooldown reads half-open. */
  snapshot(): ModelHealthState {
    return {
      state: this.currentState(),
      consecutiveFailures: this.consecutiveFailures,
      lastFailureAt: this.lastFailureAt,
      cooldownUntil: this.cooldownUntil,
      lastLatencyMs: this.lastLatencyMs
    }
  }

  /**
   * Ask to place a call. Closed circuits always allow; an elapsed cooldown
   * grants exactly one trial until that trial reports back.
   */
  acquire(): CircuitLease {
    const current = this.currentState()
    if (current === 'closed') return { granted: true, trial: false }
    if (current === 'open') return { granted: false, reason: 'open' }
    if (this.trialInFlight) return { granted: false, reason: 'trial-in-flight' }
    this.trialInFlight = true
    return { granted: true, trial: true }
  }

  /** Give back a trial lease whose call never produced an outcome (e.g. caller cancelled). */
  abandon(): void {
    this.trialInFlight = false
  }

  /**
   * Report a call's outcome. Only the holder of the trial lease passes
   * `trial`; while the circuit is open, outcomes of calls leased before it
   * opened update the counters but leave the state and cooldown alone.
   */
  record(success: boolean, latencyMs: number, trial = false): CircuitTransition | null {
    const from = this.currentState()
    if (trial) this.trialInFlight = false
    this.lastLatencyMs = latencyMs

    const now = this.now()
    if (!success) {
      this.consecutiveFailures += 1
      this.lastFailureAt = now
    }

    if (this.state === 'open' && !trial) {
      const to = this.currentState()
      return from === to ? null : { from, to }
    }

    if (success) {
      this.state = 'closed'
      this.consecutiveFailures = 0
      this.cooldownUntil = null
    } else if (trial || this.consecutiveFailures >= this.options.failureThreshold) {
      this.state = 'open'
      this.cooldownUntil = now + this.options.cooldownMs
    }

    const to = this.currentState()
    return from === to ? null : { from, to }
  }

  private currentState(): CircuitState {
    if (this.state === 'closed') return 'closed'
    if (this.trialInFlight) return 'half-open'
    if (this.cooldownUntil !== null && this.now() >= this.cooldownUntil) return 'half-open'
    return 'open'
  }
}
