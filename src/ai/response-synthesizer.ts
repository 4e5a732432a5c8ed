// ---------------------------------------------------------------------------
// Response Synthesizer — batch merge and incremental stream merge
// ---------------------------------------------------------------------------

import type { ErrorScope } from './errors'
import type { ModelProfile, StreamChunk } from './model-interface'
import type { TaskClassification } from './task-classifier'
import { primaryEntries, type ModelPlan, type PlanRole } from './task-router'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type InvocationStatus = 'success' | 'timeout' | 'error' | 'circuit-open'

export interface ModelInvocationResult {
  modelId: string
  role: PlanRole
  status: InvocationStatus
  /** Present only on success. */
  content?: string
  confidence?: number
  latencyMs: number
  timestamp: number
  attempts: number
  /** Last error seen, on anything but success. */
  error?: { code: string; message: string }
}

export type ResponseStatus = 'success' | 'partial' | 'failure'

export interface TraceEntry {
  modelId: string
  status: InvocationStatus
  attempts: number
  latencyMs: number
}

export interface ResponseError {
  code: string
  scope: ErrorScope
  message: string
  causes: string[]
}

export interface SynthesizedResponse {
  content: string
  confidence: number
  contributingModels: string[]
  status: ResponseStatus
  classification?: TaskClassification
  plan?: ModelPlan
  trace: TraceEntry[]
  error?: ResponseError
}

export interface SynthesisContext {
  plan: ModelPlan
  profiles: ReadonlyMap<string, ModelProfile>
}

/**
 * How differing answers are combined. `sections` concatenates every answer
 * under its model's name; `code` keeps the most confident answer and appends
 * the code blocks only the others wrote; `key-points` does the same with
 * list items.
 */
export type MergeStrategy = 'sections' | 'code' | 'key-points'

export interface SynthesizerOptions {
  /** Word-trigram Jaccard similarity at which two answers count as the same. */
  similarityThreshold?: number
  /** Merge strategy per plan category; unlisted categories use `sections`. */
  strategies?: Readonly<Record<string, MergeStrategy>>
}

// --- Streaming merge ---

export interface MergeState {
  readonly multiModel: boolean
  /** Per model text received but not yet emitted (multi-model mode only). */
  readonly pending: Readonly<Record<string, string>>
}

export interface MergeInput {
  modelId: string
  chunk: StreamChunk
}

export interface MergeEmit {
  modelId: string
  content: string
}

// ---------------------------------------------------------------------------
// Synthesizer
// ---------------------------------------------------------------------------

export class ResponseSynthesizer {
  private similarityThreshold: number
  private strategies: Readonly<Record<string, MergeStrategy>>

  constructor(options: SynthesizerOptions = {}) {
    this.similarityThreshold = options.similarityThreshold ?? 0.85
    this.strategies = options.strategies ?? {}
  }

  synthesize(results: readonly ModelInvocationResult[], ctx: SynthesisContext): SynthesizedResponse {
    const trace = results.map((r) => ({
      modelId: r.modelId,
      status: r.status,
      attempts: r.attempts,
      latencyMs: r.latencyMs
    }))
    const successes = results.filter(isSuccess)

    if (successes.length === 0) {
      return {
        content: '',
        confidence: 0,
        contributingModels: [],
        status: 'failure',
        plan: ctx.plan,
        trace,
        error: failureError(results)
      }
    }

    const status = this.statusFor(successes, ctx.plan)

    if (successes.length === 1) {
      const only = successes[0]
      return {
        content: only.content,
        confidence: only.confidence,
        contributingModels: [only.modelId],
        status,
        plan: ctx.plan,
        trace
      }
    }

    const best = successes.reduce((a, b) => (b.confidence > a.confidence ? b : a))
    const allAgree = successes.every(
      (s) => s === best || similarity(s.content, best.content) >= this.similarityThreshold
    )
    if (allAgree) {
      return {
        content: best.content,
        confidence: best.confidence,
        contributingModels: [best.modelId],
        status,
        plan: ctx.plan,
        trace
      }
    }

    const strategy = this.strategies[ctx.plan.category] ?? 'sections'
    if (strategy !== 'sections') {
      const merged =
        strategy === 'code'
          ? mergeExtras(successes, ctx.profiles, codeBlocks, '\n\n')
          : mergeExtras(successes, ctx.profiles, keyPoints, '\n')
      return {
        content: merged.content,
        confidence: weightedConfidence(merged.contributors, ctx.profiles),
        contributingModels: merged.contributors.map((s) => s.modelId),
        status,
        plan: ctx.plan,
        trace
      }
    }

    const content = successes
      .map((s) => `### ${modelName(s.modelId, ctx.profiles)}\n${s.content}`)
      .join('\n\n')

    return {
      content,
      confidence: weightedConfidence(successes, ctx.profiles),
      contributingModels: successes.map((s) => s.modelId),
      status,
      plan: ctx.plan,
      trace
    }
  }

  // ---------------------------------------------------------------------------
  // Streaming
  // ---------------------------------------------------------------------------

  createMergeState(multiModel: boolean): MergeState {
    return Object.freeze({ multiModel, pending: Object.freeze({}) })
  }

  /**
   * Fold one chunk into the merge state. Single-model text is emitted as-is;
   * multi-model text is held back until a sentence boundary so sections from
   * different models interleave on whole sentences.
   */
  mergeChunk(state: MergeState, input: MergeInput): { state: MergeState; emit: MergeEmit[] } {
    const { modelId, chunk } = input

    if (!state.multiModel) {
      if (chunk.type === 'text' && chunk.content.length > 0) {
        return { state, emit: [{ modelId, content: chunk.content }] }
      }
      return { state, emit: [] }
    }

    const buffered = state.pending[modelId] ?? ''

    if (chunk.type === 'done') {
      const rest = Object.fromEntries(Object.entries(state.pending).filter(([id]) => id !== modelId))
      const emit = buffered.length > 0 ? [{ modelId, content: buffered }] : []
      return { state: withPending(state, rest), emit }
    }

    const combined = buffered + chunk.content
    const cut = lastSentenceBoundary(combined)
    if (cut === 0) {
      return { state: withPending(state, { ...state.pending, [modelId]: combined }), emit: [] }
    }
    return {
      state: withPending(state, { ...state.pending, [modelId]: combined.slice(cut) }),
      emit: [{ modelId, content: combined.slice(0, cut) }]
    }
  }

  /** Flush leftovers of models that succeeded and build the final response. */
  finalize(
    state: MergeState,
    results: readonly ModelInvocationResult[],
    ctx: SynthesisContext
  ): { emit: MergeEmit[]; response: SynthesizedResponse } {
    const emit: MergeEmit[] = []
    for (const r of results) {
      const leftover = state.pending[r.modelId]
      if (r.status === 'success' && leftover !== undefined && leftover.length > 0) {
        emit.push({ modelId: r.modelId, content: leftover })
      }
    }
    return { emit, response: this.synthesize(results, ctx) }
  }

  private statusFor(successes: SuccessResult[], plan: ModelPlan): ResponseStatus {
    if (!plan.multiModel) return 'success'
    const primaries = primaryEntries(plan)
    const primaryIds = new Set(primaries.map((p) => p.modelId))
    const succeeded = successes.filter((s) => primaryIds.has(s.modelId)).length
    return succeeded < primaries.length ? 'partial' : 'success'
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

type SuccessResult = ModelInvocationResult & { content: string; confidence: number }

function isSuccess(r: ModelInvocationResult): r is SuccessResult {
  return r.status === 'success' && r.content !== undefined && r.confidence !== undefined
}

function failureError(results: readonly ModelInvocationResult[]): ResponseError {
  const causes = results.map(
    (r) => `${r.modelId}: ${r.status} — ${r.error?.message ?? 'no response'}`
  )
  if (causes.length === 0) causes.push('no model was dispatched')
  const allTimedOut = results.length > 0 && results.every((r) => r.status === 'timeout')
  return allTimedOut
    ? { code: 'timeout', scope: 'backend', message: 'No model answered before the deadline', causes }
    : { code: 'synthesis_failed', scope: 'backend', message: 'Every model in the plan failed', causes }
}

function modelName(modelId: string, profiles: ReadonlyMap<string, ModelProfile>): string {
  return profiles.get(modelId)?.name ?? modelId
}

// --- Category merges ---

/** A fragment of an answer plus the key it is deduplicated by. */
export interface AnswerFragment {
  text: string
  key: string
}

/**
 * Keep the most confident answer whole and append, per other model in
 * confidence order, the fragments nobody before it produced.
 */
function mergeExtras(
  successes: SuccessResult[],
  profiles: ReadonlyMap<string, ModelProfile>,
  extract: (content: string) => AnswerFragment[],
  joiner: string
): { content: string; contributors: SuccessResult[] } {
  const [best, ...rest] = [...successes].sort((a, b) => b.confidence - a.confidence)
  const seen = new Set(extract(best.content).map((e) => e.key))
  const sections = [best.content]
  const contributors = [best]

  for (const s of rest) {
    const fresh = extract(s.content).filter((e) => {
      if (seen.has(e.key)) return false
      seen.add(e.key)
      return true
    })
    if (fresh.length === 0) continue
    sections.push(`### Additions from ${modelName(s.modelId, profiles)}\n${fresh.map((e) => e.text).join(joiner)}`)
    contributors.push(s)
  }

  return { content: sections.join('\n\n'), contributors }
}

const FENCE = /^\s*```/

/** Closed fenced code blocks, keyed by their trimmed body. */
export function codeBlocks(content: string): AnswerFragment[] {
  const blocks: AnswerFragment[] = []
  let open: string[] | null = null
  for (const line of content.split('\n')) {
    if (!FENCE.test(line)) {
      open?.push(line)
      continue
    }
    if (open === null) {
      open = [line]
      continue
    }
    const body = open.slice(1).join('\n').trim()
    if (body.length > 0) blocks.push({ text: [...open, line].join('\n'), key: body })
    open = null
  }
  return blocks
}

const LIST_ITEM = /^\s*(?:[-*\u2022]|\d+[.)])\s+(.*\S)\s*$/

/** Bullet and numbered list items, rewritten as `- item` and keyed case-insensitively. */
export function keyPoints(content: string): AnswerFragment[] {
  const points: AnswerFragment[] = []
  for (const line of content.split('\n')) {
    const match = LIST_ITEM.exec(line)
    if (!match) continue
    const item = match[1]
    points.push({ text: `- ${item}`, key: item.toLowerCase().replace(/\s+/g, ' ') })
  }
  return points
}

/**
 * Average of model confidences weighted by declared reliability and latency
 * rank (fastest = rank 0, weight 1; next weight 1/2; ...).
 */
export function weightedConfidence(
  successes: ReadonlyArray<{ modelId: string; confidence: number; latencyMs: number }>,
  profiles: ReadonlyMap<string, ModelProfile>
): number {
  const byLatency = successes
    .map((s, index) => ({ s, index }))
    .sort((a, b) => a.s.latencyMs - b.s.latencyMs || a.index - b.index)

  let weightSum = 0
  let total = 0
  byLatency.forEach(({ s }, rank) => {
    const reliability = profiles.get(s.modelId)?.reliability ?? 1
    const weight = reliability / (rank + 1)
    weightSum += weight
    total += weight * s.confidence
  })

  if (weightSum === 0) {
    return successes.reduce((sum, s) => sum + s.confidence, 0) / successes.length
  }
  return total / weightSum
}

/** Jaccard similarity of word-trigram sets; short texts compare as one gram. */
export function similarity(a: string, b: string): number {
  const ga = trigrams(a)
  const gb = trigrams(b)
  if (ga.size === 0 && gb.size === 0) return 1
  let shared = 0
  for (const g of ga) if (gb.has(g)) shared++
  return shared / (ga.size + gb.size - shared)
}

function trigrams(text: string): Set<string> {
  const words = text.toLowerCase().split(/[^\p{L}\p{N}]+/u).filter(Boolean)
  const grams = new Set<string>()
  if (words.length === 0) return grams
  if (words.length < 3) {
    grams.add(words.join(' '))
    return grams
  }
  for (let i = 0; i <= words.length - 3; i++) {
    grams.add(`${words[i]} ${words[i + 1]} ${words[i + 2]}`)
  }
  return grams
}

const SENTENCE_BOUNDARY = /[.!?]\s|\n/g

/** Index just past the last sentence boundary, or 0 when there is none. */
export function lastSentenceBoundary(text: string): number {
  let cut = 0
  for (const match of text.matchAll(SENTENCE_BOUNDARY)) {
    cut = (match.index ?? 0) + match[0].length
  }
  return cut
}

function withPending(state: MergeState, pending: Record<string, string>): MergeState {
  return Object.freeze({ multiModel: state.multiModel, pending: Object.freeze(pending) })
}
