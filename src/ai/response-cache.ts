// ---------------------------------------------------------------------------
// Response Cache — single-flight TTL cache for synthesized responses
// ---------------------------------------------------------------------------

import type { SynthesizedResponse } from './response-synthesizer'

export interface ResponseCacheOptions {
  ttlMs?: number
  maxEntries?: number
  now?: () => number
}

interface CacheEntry {
  response: SynthesizedResponse
  expiresAt: number
}

/**
 * Every caller gets its own copy of a response, so one caller mutating what
 * it received never leaks into another's answer or into the stored entry.
 */
export class ResponseCache {
  private entries = new Map<string, CacheEntry>()
  private inFlight = new Map<string, Promise<SynthesizedResponse>>()
  private ttlMs: number
  private maxEntries: number
  private now: () => number
  private hits = 0
  private misses = 0

  constructor(options: ResponseCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? 3_600_000
    this.maxEntries = options.maxEntries ?? 500
    this.now = options.now ?? Date.now
  }

  /** Lower-cased, trimmed, whitespace-collapsed query scoped to its conversation. */
  static key(text: string, conversationId?: string): string {
    const normalized = text.trim().toLowerCase().replace(/\s+/g, ' ')
    return `${conversationId ?? ''}\u0000${normalized}`
  }

  get(key: string): SynthesizedResponse | undefined {
    const entry = this.entries.get(key)
    if (!entry) return undefined
    if (this.now() >= entry.expiresAt) {
      this.entries.delete(key)
      return undefined
    }
    return structuredClone(entry.response)
  }

  /**
   * Return the cached response, join an identical in-flight computation, or
   * run `compute`. Only successful responses are stored.
   */
  async getOrCompute(
    key: string,
    compute: () => Promise<SynthesizedResponse>
  ): Promise<{ response: SynthesizedResponse; cached: boolean }> {
    const hit = this.get(key)
    if (hit) {
      this.hits++
      return { response: hit, cached: true }
    }

    const pending = this.inFlight.get(key)
    if (pending) {
      this.hits++
      return { response: structuredClone(await pending), cached: true }
    }

    this.misses++
    const task = compute()
    this.inFlight.set(key, task)
    try {
      const response = await task
      if (response.status === 'success') this.set(key, response)
      return { response: structuredClone(response), cached: false }
    } finally {
      this.inFlight.delete(key)
    }
  }

  set(key: string, response: SynthesizedResponse): void {
    this.entries.delete(key)
    this.entries.set(key, { response: structuredClone(response), expiresAt: this.now() + this.ttlMs })
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next()
      if (oldest.done) break
      this.entries.delete(oldest.value)
    }
  }

  clear(): void {
    this.entries.clear()
  }

  stats(): { size: number; hits: number; misses: number } {
    return { size: this.entries.size, hits: this.hits, misses: this.misses }
  }
}
