// ---------------------------------------------------------------------------
// Context Manager — bounded per-conversation history with token budgeting
// ---------------------------------------------------------------------------

import type { ChatMessage, ModelProfile } from './model-interface'

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export interface ConversationTurn {
  readonly query: string
  readonly response: string
  readonly timestamp: number
}

export interface ContextManagerOptions {
  /** Turns kept per conversation; older ones fall off the front. */
  maxTurns?: number
  /** Idle time after which a conversation reads as empty. */
  ttlMs?: number
  /** Tokens held back from the context window for the model's answer. */
  reservedOutputTokens?: number
  now?: () => number
}

interface Conversation {
  turns: ConversationTurn[]
  updatedAt: number
}

// ---------------------------------------------------------------------------
// Context Manager
// ---------------------------------------------------------------------------

export class ContextManager {
  private conversations = new Map<string, Conversation>()
  private locks = new Map<string, Promise<void>>()
  private maxTurns: number
  private ttlMs: number
  private reservedOutputTokens: number
  private now: () => number

  constructor(options: ContextManagerOptions = {}) {
    this.maxTurns = Math.max(1, options.maxTurns ?? 10)
    this.ttlMs = options.ttlMs ?? 3_600_000
    this.reservedOutputTokens = options.reservedOutputTokens ?? 1024
    this.now = options.now ?? Date.now
  }

  // ---------------------------------------------------------------------------
  // History
  // ---------------------------------------------------------------------------

  append(conversationId: string, query: string, response: string): void {
    const now = this.now()
    const existing = this.live(conversationId)
    const turns = existing ? existing.turns : []
    turns.push(Object.freeze({ query, response, timestamp: now }))
    if (turns.length > this.maxTurns) {
      turns.splice(0, turns.length - this.maxTurns)
    }
    this.conversations.set(conversationId, { turns, updatedAt: now })
  }

  /** Oldest-first copy of the conversation; empty for unknown or expired ids. */
  window(conversationId: string): readonly ConversationTurn[] {
    return this.live(conversationId)?.turns.slice() ?? []
  }

  clear(conversationId: string): void {
    this.conversations.delete(conversationId)
  }

  /** Drop every expired conversation; returns how many were removed. */
  prune(): number {
    let removed = 0
    for (const id of Array.from(this.conversations.keys())) {
      if (this.live(id) === undefined) removed++
    }
    return removed
  }

  size(): number {
    return this.conversations.size
  }

  // ---------------------------------------------------------------------------
  // Turn serialization
  // ---------------------------------------------------------------------------

  /**
   * Wait for earlier turns on the same conversation, then hold it until the
   * returned release function is called.
   */
  async acquire(conversationId: string): Promise<() => void> {
    const previous = this.locks.get(conversationId) ?? Promise.resolve()
    let unlock: () => void = () => undefined
    const held = new Promise<void>((resolve) => {
      unlock = resolve
    })
    const tail = previous.then(() => held)
    this.locks.set(conversationId, tail)

    await previous

    let released = false
    return () => {
      if (released) return
      released = true
      unlock()
      if (this.locks.get(conversationId) === tail) this.locks.delete(conversationId)
    }
  }

  // ---------------------------------------------------------------------------
  // Prompt building
  // ---------------------------------------------------------------------------

  /**
   * Render history plus the current query as chat messages that fit the
   * model's context window. Recent turns win; the query itself is cut only
   * when it alone exceeds the budget.
   */
  buildMessages(
    window: readonly ConversationTurn[],
    query: string,
    model: ModelProfile
  ): ChatMessage[] {
    const messages: ChatMessage[] = []
    for (const turn of window) {
      messages.push({ role: 'user', content: turn.query })
      messages.push({ role: 'assistant', content: turn.response })
    }
    messages.push({ role: 'user', content: query })

    const budget = Math.max(1, model.contextWindow - this.reservedOutputTokens)
    const total = messages.reduce((sum, m) => sum + estimateTokens(m.content), 0)
    return total > budget ? trimMessages(messages, budget) : messages
  }

  private live(conversationId: string): Conversation | undefined {
    const conversation = this.conversations.get(conversationId)
    if (!conversation) return undefined
    if (this.now() - conversation.updatedAt >= this.ttlMs) {
      this.conversations.delete(conversationId)
      return undefined
    }
    return conversation
  }
}

// ---------------------------------------------------------------------------
// Token estimation
// ---------------------------------------------------------------------------

/**
 * Rough heuristic: ~4 chars per token for English text.
 * Real counts come back in the API usage fields.
 */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4)
}

// ---------------------------------------------------------------------------
// Message trimming
// ---------------------------------------------------------------------------

/**
 * Trim conversation messages to fit within a token budget.
 * Always keeps the last message (the current query) and trims from the top.
 */
export function trimMessages(messages: ChatMessage[], budgetTokens: number): ChatMessage[] {
  if (messages.length === 0) return []

  const last = messages[messages.length - 1]
  const lastTokens = estimateTokens(last.content)

  if (lastTokens >= budgetTokens) {
    const maxChars = budgetTokens * 4
    return [
      {
        ...last,
        content: last.content.slice(0, maxChars) + '\n\n[content truncated]'
      }
    ]
  }

  let remaining = budgetTokens - lastTokens
  const kept: ChatMessage[] = []

  for (let i = messages.length - 2; i >= 0; i--) {
    const tokens = estimateTokens(messages[i].content)
    if (tokens <= remaining) {
      kept.unshift(messages[i])
      remaining -= tokens
    } else {
      break
    }
  }

  kept.push(last)
  return kept
}
