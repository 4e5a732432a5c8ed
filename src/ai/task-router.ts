// ---------------------------------------------------------------------------
// Task Router — classification plus capability/health-aware model plans
// ---------------------------------------------------------------------------

import { createLogger, type Logger } from '../logger'
import { ClassificationError, errorMessage } from './errors'
import type { ModelClient } from './model-interface'
import type { ModelRegistry } from './model-registry'
import {
  KeywordClassifier,
  type TaskClassification,
  type TaskClassifier
} from './task-classifier'

export type PlanRole = 'primary' | 'fallback'

export interface PlanEntry {
  readonly modelId: string
  readonly role: PlanRole
}

/** Immutable snapshot; never re-derived while a call is in flight. */
export interface ModelPlan {
  readonly category: string
  readonly entries: readonly PlanEntry[]
  readonly multiModel: boolean
  readonly createdAt: number
}

export interface RoutedQuery {
  classification: TaskClassification
  plan: ModelPlan
}

/** Read side of the performance monitor used for tie-breaks. */
export interface LatencySource {
  recentLatency(modelId: string, windowMs: number): number | null
}

export interface TaskRouterOptions {
  classifier?: TaskClassifier
  latency?: LatencySource
  /** Categories that dispatch several primaries in parallel. */
  multiModelCategories?: readonly string[]
  multiModelCount?: number
  /** Below this primary confidence, second-category candidates join as fallbacks. */
  confidenceThreshold?: number
  defaultModel?: string
  fallbackChain?: readonly string[]
  latencyWindowMs?: number
}

const DEFAULT_RANK = 0.5

export class TaskRouter {
  private classifier: TaskClassifier
  private multiModelCategories: ReadonlySet<string>
  private multiModelCount: number
  private confidenceThreshold: number
  private latencyWindowMs: number
  private log: Logger

  constructor(
    private registry: ModelRegistry,
    private options: TaskRouterOptions = {}
  ) {
    this.classifier = options.classifier ?? new KeywordClassifier()
    this.multiModelCategories = new Set(options.multiModelCategories ?? [])
    this.multiModelCount = Math.max(2, options.multiModelCount ?? 2)
    this.confidenceThreshold = options.confidenceThreshold ?? 0.8
    this.latencyWindowMs = options.latencyWindowMs ?? 15 * 60_000
    this.log = createLogger('task-router')
  }

  async classifyAndPlan(
    text: string,
    context?: Readonly<Record<string, unknown>>
  ): Promise<RoutedQuery> {
    const classification = await this.classify(text, context)
    const plan = this.plan(classification)
    this.log.debug(
      {
        primary: classification.primary,
        category: plan.category,
        models: plan.entries.map((e) => `${e.modelId}:${e.role}`)
      },
      'query routed'
    )
    return { classification, plan }
  }

  async classify(
    text: string,
    context?: Readonly<Record<string, unknown>>
  ): Promise<TaskClassification> {
    if (text.trim().length === 0) {
      throw new ClassificationError('Cannot classify an empty query')
    }

    let classification: TaskClassification
    try {
      classification = await this.classifier.classify(text, context)
    } catch (err) {
      if (err instanceof ClassificationError) throw err
      throw new ClassificationError(`Classifier failed: ${errorMessage(err)}`)
    }

    if (classification.scores.length === 0) {
      throw new ClassificationError('Classifier returned no categories')
    }
    return classification
  }

  // ---------------------------------------------------------------------------
  // Planning
  // ---------------------------------------------------------------------------

  plan(classification: TaskClassification): ModelPlan {
    const entries: PlanEntry[] = []
    const seen = new Set<string>()
    const add = (modelId: string, role: PlanRole): void => {
      if (seen.has(modelId)) return
      seen.add(modelId)
      entries.push(Object.freeze({ modelId, role }))
    }

    let category = classification.primary.category
    let candidates: ModelClient[] = []
    for (const score of classification.scores) {
      const found = this.candidates(score.category)
      if (found.length > 0) {
        category = score.category
        candidates = found
        break
      }
    }

    let multiModel = false
    if (candidates.length > 0) {
      multiModel = this.multiModelCategories.has(category) && candidates.length >= 2
      const primaryCount = multiModel ? Math.min(this.multiModelCount, candidates.length) : 1
      candidates.forEach((c, i) => add(c.profile.id, i < primaryCount ? 'primary' : 'fallback'))
    } else {
      const fallback = this.options.defaultModel
      if (fallback === undefined || !this.isEligible(fallback)) {
        throw new ClassificationError(
          `No eligible model for category "${classification.primary.category}"`
        )
      }
      this.log.warn({ category, defaultModel: fallback }, 'no capable model, using default model')
      add(fallback, 'primary')
    }

    const second = classification.scores[1]
    if (classification.primary.confidence < this.confidenceThreshold && second !== undefined) {
      for (const c of this.candidates(second.category)) add(c.profile.id, 'fallback')
    }

    for (const id of this.options.fallbackChain ?? []) {
      if (this.isEligible(id)) add(id, 'fallback')
    }

    return Object.freeze({
      category,
      entries: Object.freeze(entries),
      multiModel,
      createdAt: Date.now()
    })
  }

  /**
   * Eligible models for a category, best first: specialization rank, then
   * lowest recent latency (unmeasured last), then declaration order.
   */
  candidates(category: string): ModelClient[] {
    const eligible = this.registry
      .capableModels(category)
      .filter((c) => !this.registry.isOpen(c.profile.id))

    const keyed = eligible.map((client, index) => ({
      client,
      index,
      rank: client.profile.specialization[category] ?? DEFAULT_RANK,
      latency: this.options.latency?.recentLatency(client.profile.id, this.latencyWindowMs) ?? null
    }))

    keyed.sort((a, b) => {
      if (a.rank !== b.rank) return b.rank - a.rank
      if (a.latency !== b.latency) {
        if (a.latency === null) return 1
        if (b.latency === null) return -1
        return a.latency - b.latency
      }
      return a.index - b.index
    })

    return keyed.map((k) => k.client)
  }

  private isEligible(modelId: string): boolean {
    return this.registry.get(modelId) !== undefined && !this.registry.isOpen(modelId)
  }
}

export function primaryEntries(plan: ModelPlan): PlanEntry[] {
  return plan.entries.filter((e) => e.role === 'primary')
}
