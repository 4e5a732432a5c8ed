// ---------------------------------------------------------------------------
// Orchestrator — dispatch with deadlines, retries, circuit gating and streaming
// ---------------------------------------------------------------------------

import { createLogger, type Logger } from '../logger'
import { RemoteError, errorMessage } from './errors'
import {
  estimateConfidence,
  type ChatMessage,
  type GenerationParams,
  type ModelClient,
  type ModelProfile,
  type StreamChunk
} from './model-interface'
import type { ModelRegistry } from './model-registry'
import type { PerformanceEntry } from './performance-monitor'
import {
  ResponseSynthesizer,
  type MergeInput,
  type ModelInvocationResult,
  type SynthesisContext,
  type SynthesizedResponse
} from './response-synthesizer'
import { DEFAULT_RETRY_POLICY, backoffDelay, sleep, type RetryPolicy } from './retry-policy'
import { primaryEntries, type ModelPlan, type PlanEntry } from './task-router'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface DispatchRequest {
  /** Builds the prompt per model so each one fits its own context window. */
  messages: (profile: ModelProfile) => ChatMessage[]
  params?: GenerationParams
}

export interface PerformanceRecorder {
  record(entry: PerformanceEntry): unknown
}

export interface OrchestratorOptions {
  retry?: RetryPolicy
  attemptTimeoutMs?: number
  globalTimeoutMs?: number
  monitor?: PerformanceRecorder
  synthesizer?: ResponseSynthesizer
  random?: () => number
}

export interface ExecuteOptions {
  signal?: AbortSignal
}

export interface ExecutionResult {
  results: ModelInvocationResult[]
  response: SynthesizedResponse
}

export type StreamEvent =
  | { type: 'chunk'; modelId: string; content: string }
  | { type: 'final'; response: SynthesizedResponse; results: ModelInvocationResult[] }

type DispatchOutcome =
  | { ok: true; results: ModelInvocationResult[] }
  | { ok: false; error: unknown }

// ---------------------------------------------------------------------------
// Orchestrator
// ---------------------------------------------------------------------------

export class Orchestrator {
  private retry: RetryPolicy
  private attemptTimeoutMs: number
  private globalTimeoutMs: number
  private synthesizer: ResponseSynthesizer
  private random: () => number
  private log: Logger

  constructor(
    private registry: ModelRegistry,
    private options: OrchestratorOptions = {}
  ) {
    this.retry = options.retry ?? DEFAULT_RETRY_POLICY
    this.attemptTimeoutMs = options.attemptTimeoutMs ?? 30_000
    this.globalTimeoutMs = options.globalTimeoutMs ?? 60_000
    this.synthesizer = options.synthesizer ?? new ResponseSynthesizer()
    this.random = options.random ?? Math.random
    this.log = createLogger('orchestrator')
  }

  /** Run the plan to completion (or the deadline) and synthesize one response. */
  async execute(
    plan: ModelPlan,
    request: DispatchRequest,
    options: ExecuteOptions = {}
  ): Promise<ExecutionResult> {
    const run = new Run(this.globalTimeoutMs, options.signal)
    try {
      const results = await this.dispatch(plan, request, run)
      const response = this.synthesizer.synthesize(results, this.synthesisContext(plan))
      return { results, response }
    } finally {
      run.dispose()
    }
  }

  /**
   * Stream merged chunks as they arrive, ending with exactly one `final`
   * event. Stopping iteration early aborts every in-flight call and waits
   * for them to settle before returning.
   */
  async *stream(
    plan: ModelPlan,
    request: DispatchRequest,
    options: ExecuteOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const run = new Run(this.globalTimeoutMs, options.signal)
    const channel = new AsyncChannel<MergeInput>()
    const driver: Promise<DispatchOutcome> = this.dispatch(plan, request, run, (input) =>
      channel.push(input)
    )
      .then(
        (results): DispatchOutcome => ({ ok: true, results }),
        (error: unknown): DispatchOutcome => ({ ok: false, error })
      )
      .finally(() => channel.close())

    let state = this.synthesizer.createMergeState(primaryEntries(plan).length > 1)
    let finished = false
    try {
      for (;;) {
        const next = await channel.next()
        if (next.done) break
        const merged = this.synthesizer.mergeChunk(state, next.value)
        state = merged.state
        for (const e of merged.emit) {
          yield { type: 'chunk', modelId: e.modelId, content: e.content }
        }
      }

      const outcome = await driver
      if (!outcome.ok) throw outcome.error

      const { emit, response } = this.synthesizer.finalize(
        state,
        outcome.results,
        this.synthesisContext(plan)
      )
      for (const e of emit) {
        yield { type: 'chunk', modelId: e.modelId, content: e.content }
      }
      finished = true
      yield { type: 'final', response, results: outcome.results }
    } finally {
      if (!finished) run.cancel()
      await driver
      run.dispose()
    }
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  private async dispatch(
    plan: ModelPlan,
    request: DispatchRequest,
    run: Run,
    sink?: (input: MergeInput) => void
  ): Promise<ModelInvocationResult[]> {
    const results: ModelInvocationResult[] = []
    const streamed = new Set<string>()
    const forward = (modelId: string): ((chunk: StreamChunk) => void) | undefined => {
      if (!sink) return undefined
      return (chunk) => {
        if (chunk.type === 'text') streamed.add(modelId)
        sink({ modelId, chunk })
      }
    }

    const primaries = primaryEntries(plan)
    let sequential: readonly PlanEntry[] = plan.entries

    if (primaries.length > 1) {
      const settled = await Promise.all(
        primaries.map((entry) =>
          this.invoke(entry, request, run, plan.category, forward(entry.modelId))
        )
      )
      results.push(...settled)
      if (settled.some((r) => r.status === 'success')) return results
      sequential = plan.entries.filter((e) => e.role === 'fallback')
    }

    for (const entry of sequential) {
      if (run.signal.aborted) break
      const previous = results[results.length - 1]
      if (previous !== undefined) {
        this.log.warn(
          { from: previous.modelId, to: entry.modelId, status: previous.status },
          'falling back to next model'
        )
      }

      const result = await this.invoke(entry, request, run, plan.category, forward(entry.modelId))
      results.push(result)
      if (result.status === 'success') break
      // Once text has reached the caller the stream is committed to this model
      if (streamed.has(entry.modelId)) break
    }

    return results
  }

  /** All attempts against one model, bounded by the retry policy and the run deadline. */
  private async invoke(
    entry: PlanEntry,
    request: DispatchRequest,
    run: Run,
    category: string,
    onChunk?: (chunk: StreamChunk) => void
  ): Promise<ModelInvocationResult> {
    const { modelId, role } = entry
    const started = Date.now()
    const client = this.registry.get(modelId)
    if (!client) {
      return {
        modelId,
        role,
        status: 'error',
        latencyMs: 0,
        timestamp: started,
        attempts: 0,
        error: { code: 'unknown', message: `Model "${modelId}" is not registered` }
      }
    }

    let attempts = 0
    let committed = false
    let lastError: RemoteError | null = null
    const emit = onChunk
      ? (chunk: StreamChunk): void => {
          if (chunk.type === 'text') committed = true
          onChunk(chunk)
        }
      : undefined

    while (!run.signal.aborted) {
      const lease = this.registry.acquire(modelId)
      if (!lease.granted) {
        if (attempts > 0) break
        this.log.warn({ modelId, reason: lease.reason }, 'circuit open, skipping model')
        return {
          modelId,
          role,
          status: 'circuit-open',
          latencyMs: 0,
          timestamp: started,
          attempts: 0,
          error: {
            code: 'circuit_open',
            message:
              lease.reason === 'open'
                ? `Circuit for ${modelId} is open`
                : `Circuit for ${modelId} is held by a trial call`
          }
        }
      }

      attempts++
      const attemptStarted = Date.now()
      this.log.debug({ modelId, attempt: attempts, trial: lease.trial }, 'dispatching attempt')

      try {
        const output = await this.attempt(run, modelId, (signal) =>
          emit ? this.streamOnce(client, request, signal, emit) : this.generateOnce(client, request, signal)
        )
        this.registry.recordOutcome(modelId, true, Date.now() - attemptStarted, lease.trial)
        return this.finish(
          {
            modelId,
            role,
            status: 'success',
            content: output.content,
            confidence: output.confidence,
            latencyMs: Date.now() - started,
            timestamp: started,
            attempts
          },
          category
        )
      } catch (err) {
        const error = toRemoteError(err, modelId)
        lastError = error
        if (run.cancelled) {
          if (lease.trial) this.registry.abandon(modelId)
        } else {
          this.registry.recordOutcome(modelId, false, Date.now() - attemptStarted, lease.trial)
        }

        this.log.debug(
          { modelId, attempt: attempts, code: error.code, kind: error.kind },
          'attempt failed'
        )
        if (!error.transient || committed || attempts >= this.retry.maxAttempts || run.signal.aborted) {
          break
        }

        const wait = Math.min(
          backoffDelay(this.retry, attempts, this.random, error.retryAfterMs),
          run.remaining()
        )
        try {
          await sleep(wait, run.signal)
        } catch {
          break
        }
      }
    }

    const timedOut = lastError ? lastError.code === 'timeout' : run.expired
    return this.finish(
      {
        modelId,
        role,
        status: timedOut ? 'timeout' : 'error',
        latencyMs: Date.now() - started,
        timestamp: started,
        attempts,
        error: lastError
          ? { code: lastError.code, message: lastError.message }
          : run.expired
            ? { code: 'timeout', message: 'Deadline passed before the model was called' }
            : { code: 'aborted', message: 'Request cancelled before the model was called' }
      },
      category
    )
  }

  /** One call bounded by min(attempt timeout, time left on the run). */
  private async attempt<T>(
    run: Run,
    modelId: string,
    work: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController()
    let timedOut = false
    const timer = setTimeout(
      () => {
        timedOut = true
        controller.abort()
      },
      Math.min(this.attemptTimeoutMs, run.remaining())
    )
    const onRunAbort = (): void => controller.abort()
    if (run.signal.aborted) controller.abort()
    else run.signal.addEventListener('abort', onRunAbort, { once: true })

    try {
      if (controller.signal.aborted) throw new Error('aborted before dispatch')
      return await raceAbort(work(controller.signal), controller.signal)
    } catch (err) {
      if (timedOut || run.expired) {
        throw new RemoteError(`${modelId} did not answer in time`, 'timeout', modelId, 'transient')
      }
      if (run.cancelled) {
        throw new RemoteError('Request cancelled', 'aborted', modelId, 'permanent')
      }
      throw toRemoteError(err, modelId)
    } finally {
      clearTimeout(timer)
      run.signal.removeEventListener('abort', onRunAbort)
    }
  }

  private async generateOnce(
    client: ModelClient,
    request: DispatchRequest,
    signal: AbortSignal
  ): Promise<{ content: string; confidence: number }> {
    const generation = await client.generate({
      ...request.params,
      messages: request.messages(client.profile),
      signal
    })
    if (generation.content.trim().length === 0) {
      throw emptyResponse(client.profile.id)
    }
    return { content: generation.content, confidence: generation.confidence }
  }

  private async streamOnce(
    client: ModelClient,
    request: DispatchRequest,
    signal: AbortSignal,
    emit: (chunk: StreamChunk) => void
  ): Promise<{ content: string; confidence: number }> {
    const iterator = client
      .stream({ ...request.params, messages: request.messages(client.profile), signal })
      [Symbol.asyncIterator]()

    let content = ''
    let drained = false
    try {
      for (;;) {
        const next = await raceAbort(iterator.next(), signal)
        if (next.done) break
        const chunk = next.value
        if (chunk.type === 'text') {
          if (chunk.content.length === 0) continue
          content += chunk.content
        }
        emit(chunk)
      }
      drained = true
    } finally {
      if (!drained && iterator.return) {
        void iterator.return().then(undefined, (err: unknown) => {
          this.log.debug({ modelId: client.profile.id, err: errorMessage(err) }, 'stream close failed')
        })
      }
    }

    if (content.trim().length === 0) throw emptyResponse(client.profile.id)
    return { content, confidence: estimateConfidence(content) }
  }

  private finish(result: ModelInvocationResult, category: string): ModelInvocationResult {
    this.options.monitor?.record({
      subject: result.modelId,
      latencyMs: result.latencyMs,
      success: result.status === 'success',
      category,
      timestamp: result.timestamp,
      errorCode: result.error?.code
    })
    return result
  }

  private synthesisContext(plan: ModelPlan): SynthesisContext {
    const profiles = new Map<string, ModelProfile>()
    for (const entry of plan.entries) {
      const profile = this.registry.profile(entry.modelId)
      if (profile) profiles.set(entry.modelId, profile)
    }
    return { plan, profiles }
  }
}

// ---------------------------------------------------------------------------
// Run — deadline and cancellation shared by every call of one request
// ---------------------------------------------------------------------------

class Run {
  private controller = new AbortController()
  private timer: ReturnType<typeof setTimeout>
  readonly deadline: number
  expired = false
  cancelled = false

  constructor(
    globalTimeoutMs: number,
    private caller?: AbortSignal
  ) {
    this.deadline = Date.now() + globalTimeoutMs
    this.timer = setTimeout(() => {
      if (this.controller.signal.aborted) return
      this.expired = true
      this.controller.abort()
    }, globalTimeoutMs)

    if (caller?.aborted) this.cancel()
    else caller?.addEventListener('abort', this.onCallerAbort, { once: true })
  }

  get signal(): AbortSignal {
    return this.controller.signal
  }

  remaining(): number {
    return Math.max(0, this.deadline - Date.now())
  }

  cancel(): void {
    if (this.controller.signal.aborted) return
    this.cancelled = true
    this.controller.abort()
  }

  dispose(): void {
    clearTimeout(this.timer)
    this.caller?.removeEventListener('abort', this.onCallerAbort)
  }

  private onCallerAbort = (): void => this.cancel()
}

// ---------------------------------------------------------------------------
// Async channel — unbounded queue drained by the stream generator
// ---------------------------------------------------------------------------

class AsyncChannel<T> {
  private items: T[] = []
  private waiters: Array<(result: IteratorResult<T, undefined>) => void> = []
  private closed = false

  push(item: T): void {
    if (this.closed) return
    const waiter = this.waiters.shift()
    if (waiter) waiter({ value: item, done: false })
    else this.items.push(item)
  }

  close(): void {
    this.closed = true
    for (const waiter of this.waiters.splice(0)) waiter({ value: undefined, done: true })
  }

  next(): Promise<IteratorResult<T, undefined>> {
    if (this.items.length > 0) {
      const [item] = this.items.splice(0, 1)
      return Promise.resolve({ value: item, done: false })
    }
    if (this.closed) return Promise.resolve({ value: undefined, done: true })
    return new Promise((resolve) => this.waiters.push(resolve))
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Settle with whichever comes first: the promise or the signal. */
function raceAbort<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    const onAbort = (): void => reject(new Error('aborted'))
    if (signal.aborted) onAbort()
    else signal.addEventListener('abort', onAbort, { once: true })

    promise.then(
      (value) => {
        signal.removeEventListener('abort', onAbort)
        resolve(value)
      },
      (err: unknown) => {
        signal.removeEventListener('abort', onAbort)
        reject(err)
      }
    )
  })
}

function toRemoteError(err: unknown, modelId: string): RemoteError {
  if (err instanceof RemoteError) return err
  return new RemoteError(errorMessage(err), 'unknown', modelId, 'permanent')
}

function emptyResponse(modelId: string): RemoteError {
  return new RemoteError(`${modelId} returned an empty response`, 'malformed_response', modelId, 'transient')
}
