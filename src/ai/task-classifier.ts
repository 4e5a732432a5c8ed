// ---------------------------------------------------------------------------
// Task Classifier — scores a query against category signatures
// ---------------------------------------------------------------------------

import defaultSignatures from './data/category-signatures.json'

export interface CategoryScore {
  category: string
  confidence: number
}

/** Confidence-descending scores; `primary` is always `scores[0]`. */
export interface TaskClassification {
  readonly scores: readonly CategoryScore[]
  readonly primary: CategoryScore
}

export interface SignaturePattern {
  /** Case-insensitive regular expression source. */
  pattern: string
  weight: number
}

export interface CategorySignature {
  patterns: SignaturePattern[]
}

export type CategorySignatures = Record<string, CategorySignature>

/** Replaceable scoring strategy (keyword weights, embeddings, a small model, ...). */
export interface TaskClassifier {
  classify(
    text: string,
    context?: Readonly<Record<string, unknown>>
  ): TaskClassification | Promise<TaskClassification>
}

export const DEFAULT_SIGNATURES: CategorySignatures = defaultSignatures

export const FALLBACK_CATEGORY = 'general'
const FALLBACK_CONFIDENCE = 0.5

// ---------------------------------------------------------------------------
// Keyword classifier
// ---------------------------------------------------------------------------

interface CompiledSignature {
  category: string
  patterns: Array<{ regex: RegExp; weight: number }>
}

export class KeywordClassifier implements TaskClassifier {
  private compiled: CompiledSignature[]

  constructor(signatures: CategorySignatures = DEFAULT_SIGNATURES) {
    this.compiled = Object.entries(signatures).map(([category, sig]) => ({
      category,
      patterns: sig.patterns.map((p) => ({ regex: new RegExp(p.pattern, 'i'), weight: p.weight }))
    }))
  }

  classify(text: string): TaskClassification {
    const scored: CategoryScore[] = []

    for (const sig of this.compiled) {
      let score = 0
      for (const { regex, weight } of sig.patterns) {
        if (regex.test(text)) score += weight
      }
      if (score > 0) {
        scored.push({ category: sig.category, confidence: roundScore(Math.min(score, 1)) })
      }
    }

    if (scored.length === 0) {
      return freezeClassification([{ category: FALLBACK_CATEGORY, confidence: FALLBACK_CONFIDENCE }])
    }

    // Array.prototype.sort is stable, so ties keep signature order
    scored.sort((a, b) => b.confidence - a.confidence)
    return freezeClassification(scored)
  }
}

export function freezeClassification(scores: CategoryScore[]): TaskClassification {
  const frozen = scores.map((s) => Object.freeze({ ...s }))
  return Object.freeze({ scores: Object.freeze(frozen), primary: frozen[0] })
}

function roundScore(value: number): number {
  return Math.round(value * 100) / 100
}
