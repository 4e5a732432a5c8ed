// ---------------------------------------------------------------------------
// Conductor — inbound facade: validate, route, orchestrate, remember
// ---------------------------------------------------------------------------

import type { Database as DatabaseType } from 'better-sqlite3'
import { z } from 'zod'
import type { ConductorConfig } from '../config/config-schema'
import { closeDatabase, openDatabase } from '../db/connection'
import { PerformanceRepository } from '../db/repositories/performance.repository'
import { SecretsRepository } from '../db/repositories/secrets.repository'
import { createLogger, setLogLevel, type Logger } from '../logger'
import type { CircuitState } from './circuit-breaker'
import { ContextManager, type ConversationTurn } from './context-manager'
import { ClassificationError, InvalidQueryError, QueryError } from './errors'
import { PromMetricsExporter } from './metrics-exporter'
import type {
  CredentialProvider,
  GenerationParams,
  ModelClient,
  ModelProfile
} from './model-interface'
import { ModelRegistry } from './model-registry'
import { Orchestrator, type DispatchRequest, type StreamEvent } from './orchestrator'
import {
  PerformanceMonitor,
  SYNTHESIS_SUBJECT,
  type PerformanceAggregate
} from './performance-monitor'
import { createModelClient } from './providers/create-model-client'
import { ResponseCache } from './response-cache'
import { ResponseSynthesizer, type SynthesizedResponse } from './response-synthesizer'
import { SecretsBridge } from './secrets-bridge'
import { KeywordClassifier, type TaskClassifier } from './task-classifier'
import { TaskRouter } from './task-router'

// ---------------------------------------------------------------------------
// Query
// ---------------------------------------------------------------------------

export const MAX_QUERY_LENGTH = 32_000

export const querySchema = z.object({
  text: z
    .string()
    .max(MAX_QUERY_LENGTH, `Query text exceeds ${MAX_QUERY_LENGTH} characters`)
    .refine((t) => t.trim().length > 0, 'Query text is empty'),
  context: z.record(z.string(), z.unknown()).optional(),
  conversationId: z.string().min(1).max(200).optional(),
  callerId: z.string().min(1).max(200).optional(),
  stream: z.boolean().optional()
})

export type Query = Readonly<z.infer<typeof querySchema>>

// ---------------------------------------------------------------------------
// Collaborators
// ---------------------------------------------------------------------------

export interface RateLimiter {
  /** True when the caller may proceed. */
  consume(callerId: string): boolean | Promise<boolean>
}

export type OverallHealth = 'healthy' | 'degraded' | 'unhealthy'

export interface HealthReport {
  overall: OverallHealth
  models: Record<string, CircuitState>
}

export interface ModelVerification {
  available: boolean
  latencyMs: number
  error?: string
}

export interface ConductorParts {
  registry: ModelRegistry
  router: TaskRouter
  orchestrator: Orchestrator
  context: ContextManager
  monitor: PerformanceMonitor
  cache?: ResponseCache
  rateLimiter?: RateLimiter
  exporter?: PromMetricsExporter
  generation?: GenerationParams
  /** Called by close(); releases whatever createConductor opened. */
  onClose?: () => void
}

export interface StreamOptions {
  signal?: AbortSignal
}

const ANONYMOUS_CALLER = 'anonymous'

// ---------------------------------------------------------------------------
// Conductor
// ---------------------------------------------------------------------------

export class Conductor {
  private log: Logger

  constructor(private parts: ConductorParts) {
    this.log = createLogger('conductor')
  }

  get registry(): ModelRegistry {
    return this.parts.registry
  }

  get exporter(): PromMetricsExporter | undefined {
    return this.parts.exporter
  }

  /**
   * Answer one query. Malformed queries and rate-limit refusals throw;
   * every other failure comes back as a response with status "failure".
   */
  async handleQuery(input: unknown): Promise<SynthesizedResponse> {
    const query = validateQuery(input)
    await this.checkRateLimit(query)

    const { cache } = this.parts
    if (!cache) return this.answer(query)

    const key = ResponseCache.key(query.text, query.conversationId)
    const { response, cached } = await cache.getOrCompute(key, () => this.answer(query))
    if (cached) this.log.debug({ conversationId: query.conversationId }, 'served from cache')
    return response
  }

  /** Stream chunk events for one query, terminated by exactly one final event. */
  async *handleQueryStream(
    input: unknown,
    options: StreamOptions = {}
  ): AsyncGenerator<StreamEvent, void, undefined> {
    const query = validateQuery(input)
    await this.checkRateLimit(query)

    const started = Date.now()
    const release = await this.lock(query)
    try {
      const window = this.historyFor(query)

      let routed
      try {
        routed = await this.parts.router.classifyAndPlan(query.text, query.context)
      } catch (err) {
        if (!(err instanceof ClassificationError)) throw err
        const response = classificationFailure(err)
        this.recordSynthesis(response, 'unclassified', started)
        yield { type: 'final', response, results: [] }
        return
      }

      const events = this.parts.orchestrator.stream(
        routed.plan,
        this.dispatchRequest(window, query.text),
        { signal: options.signal }
      )
      for await (const event of events) {
        if (event.type !== 'final') {
          yield event
          continue
        }
        const response: SynthesizedResponse = { ...event.response, classification: routed.classification }
        this.complete(query, response, routed.plan.category, started)
        yield { ...event, response }
      }
    } finally {
      release()
    }
  }

  /** `healthy` when every circuit is closed, `unhealthy` when every circuit is open. */
  getHealth(): HealthReport {
    const snapshot = this.parts.registry.healthSnapshot()
    this.parts.exporter?.updateHealth(snapshot)

    const models: Record<string, CircuitState> = {}
    for (const [id, health] of Object.entries(snapshot)) models[id] = health.state

    const states = Object.values(models)
    let overall: OverallHealth = 'degraded'
    if (states.every((s) => s === 'closed')) overall = 'healthy'
    else if (states.every((s) => s === 'open')) overall = 'unhealthy'

    return { overall, models }
  }

  /**
   * Ask every registered client whether it can take calls (credentials
   * resolve, endpoint configured). Circuits are left alone: they only move
   * on real invocation outcomes.
   */
  async verifyModels(): Promise<Record<string, ModelVerification>> {
    const clients = this.parts.registry.list()
    const checked = await Promise.all(
      clients.map(async (client): Promise<[string, ModelVerification]> => {
        const started = Date.now()
        try {
          const available = await client.isAvailable()
          return [client.profile.id, { available, latencyMs: Date.now() - started }]
        } catch (err) {
          const error = err instanceof Error ? err.message : String(err)
          return [client.profile.id, { available: false, latencyMs: Date.now() - started, error }]
        }
      })
    )

    const report: Record<string, ModelVerification> = {}
    for (const [id, verification] of checked) {
      report[id] = verification
      if (!verification.available) {
        this.log.warn({ modelId: id, error: verification.error }, 'model unavailable')
      }
    }
    return report
  }

  getPerformance(windowMs?: number): PerformanceAggregate {
    return this.parts.monitor.aggregate(windowMs)
  }

  close(): void {
    this.parts.onClose?.()
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private async answer(query: Query): Promise<SynthesizedResponse> {
    const started = Date.now()
    const release = await this.lock(query)
    try {
      const window = this.historyFor(query)

      let routed
      try {
        routed = await this.parts.router.classifyAndPlan(query.text, query.context)
      } catch (err) {
        if (!(err instanceof ClassificationError)) throw err
        const response = classificationFailure(err)
        this.recordSynthesis(response, 'unclassified', started)
        return response
      }

      const { response } = await this.parts.orchestrator.execute(
        routed.plan,
        this.dispatchRequest(window, query.text)
      )
      const full: SynthesizedResponse = { ...response, classification: routed.classification }
      this.complete(query, full, routed.plan.category, started)
      return full
    } finally {
      release()
    }
  }

  private complete(query: Query, response: SynthesizedResponse, category: string, started: number): void {
    const latencyMs = this.recordSynthesis(response, category, started)
    if (query.conversationId !== undefined && response.status !== 'failure') {
      this.parts.context.append(query.conversationId, query.text, response.content)
    }
    this.log.info(
      {
        conversationId: query.conversationId,
        category,
        status: response.status,
        models: response.contributingModels,
        confidence: Number(response.confidence.toFixed(3)),
        latencyMs
      },
      'query completed'
    )
  }

  private recordSynthesis(response: SynthesizedResponse, category: string, started: number): number {
    const latencyMs = Date.now() - started
    this.parts.monitor.record({
      subject: SYNTHESIS_SUBJECT,
      latencyMs,
      success: response.status !== 'failure',
      category,
      errorCode: response.error?.code
    })
    return latencyMs
  }

  private dispatchRequest(window: readonly ConversationTurn[], text: string): DispatchRequest {
    const { context, generation } = this.parts
    return {
      messages: (profile: ModelProfile) => context.buildMessages(window, text, profile),
      params: generation
    }
  }

  private historyFor(query: Query): readonly ConversationTurn[] {
    return query.conversationId !== undefined ? this.parts.context.window(query.conversationId) : []
  }

  private async lock(query: Query): Promise<() => void> {
    if (query.conversationId === undefined) return () => undefined
    return this.parts.context.acquire(query.conversationId)
  }

  private async checkRateLimit(query: Query): Promise<void> {
    const limiter = this.parts.rateLimiter
    if (!limiter) return
    const callerId = query.callerId ?? ANONYMOUS_CALLER
    if (!(await limiter.consume(callerId))) {
      throw new QueryError(`Rate limit exceeded for caller "${callerId}"`, 'rate_limited', 'request')
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

export function validateQuery(input: unknown): Query {
  const result = querySchema.safeParse(input)
  if (!result.success) {
    const issues = result.error.issues.map((i) =>
      i.path.length > 0 ? `${i.path.join('.')}: ${i.message}` : i.message
    )
    throw new InvalidQueryError(`Invalid query: ${issues.join('; ')}`, issues)
  }
  return Object.freeze(result.data)
}

function classificationFailure(err: ClassificationError): SynthesizedResponse {
  return {
    content: '',
    confidence: 0,
    contributingModels: [],
    status: 'failure',
    trace: [],
    error: { code: err.code, scope: err.scope, message: err.message, causes: [err.message] }
  }
}

// ---------------------------------------------------------------------------
// Wiring
// ---------------------------------------------------------------------------

export interface ConductorDeps {
  /** Replaces the SDK-backed clients (tests, custom backends). */
  clientFactory?: (profile: ModelProfile, credentials: CredentialProvider) => ModelClient
  credentials?: CredentialProvider
  classifier?: TaskClassifier
  rateLimiter?: RateLimiter
  /** Open database to use instead of storage.databasePath. Not closed by close(). */
  database?: DatabaseType
  exporter?: PromMetricsExporter
  env?: NodeJS.ProcessEnv
  random?: () => number
}

/** Build a ready Conductor from validated configuration. */
export function createConductor(config: ConductorConfig, deps: ConductorDeps = {}): Conductor {
  setLogLevel(config.logging.level)
  const env = deps.env ?? process.env

  const ownsDatabase = deps.database === undefined && config.storage.databasePath !== undefined
  const database =
    deps.database ??
    (config.storage.databasePath !== undefined ? openDatabase(config.storage.databasePath) : undefined)

  const credentials =
    deps.credentials ??
    new SecretsBridge({
      store: database ? new SecretsRepository(database) : undefined,
      masterKey: env[config.storage.masterKeyEnv],
      env
    })

  const registry = new ModelRegistry(config.circuit)
  const factory = deps.clientFactory ?? createModelClient
  for (const profile of config.models) {
    registry.register(factory(profile, credentials))
  }

  const exporter = deps.exporter ?? new PromMetricsExporter()
  const monitor = new PerformanceMonitor({
    maxRecords: config.performance.maxRecords,
    sink: database ? new PerformanceRepository(database) : undefined,
    exporter
  })

  const router = new TaskRouter(registry, {
    classifier: deps.classifier ?? new KeywordClassifier(config.routing.signatures),
    latency: monitor,
    multiModelCategories: config.routing.multiModelCategories,
    multiModelCount: config.routing.multiModelCount,
    confidenceThreshold: config.routing.confidenceThreshold,
    defaultModel: config.routing.defaultModel,
    fallbackChain: config.routing.fallbackChain,
    latencyWindowMs: config.routing.latencyWindowMs
  })

  const orchestrator = new Orchestrator(registry, {
    retry: config.orchestration.retry,
    attemptTimeoutMs: config.orchestration.attemptTimeoutMs,
    globalTimeoutMs: config.orchestration.globalTimeoutMs,
    monitor,
    synthesizer: new ResponseSynthesizer(config.synthesis),
    random: deps.random
  })

  return new Conductor({
    registry,
    router,
    orchestrator,
    monitor,
    exporter,
    context: new ContextManager(config.context),
    cache: config.cache.enabled ? new ResponseCache(config.cache) : undefined,
    rateLimiter: deps.rateLimiter,
    generation: config.generation,
    onClose: () => {
      if (ownsDatabase && database) closeDatabase(database)
    }
  })
}
