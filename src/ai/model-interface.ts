// ---------------------------------------------------------------------------
// Model Client Abstraction — Type Definitions
// ---------------------------------------------------------------------------

// --- Model profile ---

export type ModelBackend = 'openai-compatible' | 'anthropic'

export interface ModelProfile {
  id: string
  name: string
  backend: ModelBackend
  /** Base URL of the endpoint; the SDK default is used when omitted. */
  endpoint?: string
  /** Model name sent on the wire (e.g. "deepseek-chat"). */
  apiModel: string
  /** Name of the credential resolved through the CredentialProvider. */
  credential: string
  /** Task categories this model may serve. */
  capabilities: string[]
  /** Category → specialization rank in [0,1]; higher is preferred. */
  specialization: Record<string, number>
  /** Declared reliability in [0,1], used to weight synthesized confidence. */
  reliability: number
  contextWindow: number
}

// --- Messages ---

export interface ChatMessage {
  role: 'user' | 'assistant' | 'system'
  content: string
}

// --- Generation ---

export interface GenerationParams {
  systemPrompt?: string
  temperature?: number
  maxTokens?: number
  topP?: number
}

export interface GenerationRequest extends GenerationParams {
  messages: ChatMessage[]
  signal?: AbortSignal
}

export interface Generation {
  content: string
  model: string
  confidence: number
  inputTokens: number
  outputTokens: number
}

// --- Streaming ---

export type StreamChunk =
  | { type: 'text'; content: string }
  | { type: 'done'; model: string; inputTokens: number; outputTokens: number }

// --- Client capability ---

/**
 * One remote model behind a uniform contract. Failures are thrown as
 * `RemoteError` so the orchestrator can tell transient from permanent.
 */
export interface ModelClient {
  readonly profile: ModelProfile
  generate(request: GenerationRequest): Promise<Generation>
  stream(request: GenerationRequest): AsyncIterable<StreamChunk>
  isAvailable(): Promise<boolean>
}

/** Resolves a named credential to its current value, or null if unknown. */
export interface CredentialProvider {
  resolve(name: string): Promise<string | null>
}

// --- Confidence ---

/**
 * Backends rarely report confidence. Without an explicit score the estimate
 * starts at 0.8 and grows with answer length up to 1.0 at 1000 characters.
 */
export function estimateConfidence(content: string, explicit?: number): number {
  if (explicit !== undefined && Number.isFinite(explicit)) {
    return Math.min(1, Math.max(0, explicit))
  }
  const lengthFactor = Math.min(content.length / 1000, 1)
  return Math.min(0.8 + lengthFactor * 0.2, 1)
}
