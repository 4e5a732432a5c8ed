// ---------------------------------------------------------------------------
// OpenAI-compatible Client — chat-completions endpoints (DeepSeek, Qwen, ...)
// ---------------------------------------------------------------------------

import OpenAI from 'openai'
import type { ChatCompletionMessageParam } from 'openai/resources/chat/completions'
import { RemoteError, errorMessage } from '../errors'
import {
  estimateConfidence,
  type ChatMessage,
  type CredentialProvider,
  type Generation,
  type GenerationRequest,
  type ModelClient,
  type ModelProfile,
  type StreamChunk
} from '../model-interface'

export class OpenAICompatibleClient implements ModelClient {
  private client: OpenAI | null = null

  constructor(
    readonly profile: ModelProfile,
    private credentials: CredentialProvider
  ) {}

  /** Invalidate the cached SDK client (e.g. after a credential change). */
  resetClient(): void {
    this.client = null
  }

  // ---------------------------------------------------------------------------
  // Core operations
  // ---------------------------------------------------------------------------

  async generate(request: GenerationRequest): Promise<Generation> {
    const client = await this.ensureClient()

    let completion: OpenAI.Chat.Completions.ChatCompletion
    try {
      completion = await client.chat.completions.create(
        {
          model: this.profile.apiModel,
          messages: toOpenAIMessages(request.messages, request.systemPrompt),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          top_p: request.topP
        },
        { signal: request.signal }
      )
    } catch (err) {
      throw mapError(err, this.profile.id)
    }

    const choice = completion.choices[0]
    const content = choice?.message?.content
    if (typeof content !== 'string') {
      throw new RemoteError(
        `${this.profile.id} returned no message content`,
        'malformed_response',
        this.profile.id,
        'transient'
      )
    }

    const explicit =
      'confidence' in choice && typeof choice.confidence === 'number' ? choice.confidence : undefined

    return {
      content,
      model: completion.model,
      confidence: estimateConfidence(content, explicit),
      inputTokens: completion.usage?.prompt_tokens ?? 0,
      outputTokens: completion.usage?.completion_tokens ?? 0
    }
  }

  async *stream(request: GenerationRequest): AsyncIterable<StreamChunk> {
    const client = await this.ensureClient()

    let inputTokens = 0
    let outputTokens = 0
    let model = this.profile.apiModel

    try {
      const stream = await client.chat.completions.create(
        {
          model: this.profile.apiModel,
          messages: toOpenAIMessages(request.messages, request.systemPrompt),
          temperature: request.temperature,
          max_tokens: request.maxTokens,
          top_p: request.topP,
          stream: true
        },
        { signal: request.signal }
      )

      for await (const chunk of stream) {
        model = chunk.model || model
        if (chunk.usage) {
          inputTokens = chunk.usage.prompt_tokens
          outputTokens = chunk.usage.completion_tokens
        }
        const delta = chunk.choices[0]?.delta?.content
        if (delta) yield { type: 'text', content: delta }
      }
    } catch (err) {
      throw mapError(err, this.profile.id)
    }

    yield { type: 'done', model, inputTokens, outputTokens }
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    const key = await this.credentials.resolve(this.profile.credential)
    return key !== null && key.length > 0
  }

  private async ensureClient(): Promise<OpenAI> {
    if (this.client) return this.client

    const apiKey = await this.credentials.resolve(this.profile.credential)
    if (!apiKey) {
      throw new RemoteError(
        `Credential "${this.profile.credential}" for ${this.profile.id} is not configured`,
        'authentication_failed',
        this.profile.id,
        'permanent'
      )
    }

    // Retries belong to the orchestrator
    this.client = new OpenAI({ apiKey, baseURL: this.profile.endpoint, maxRetries: 0 })
    return this.client
  }
}

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

function toOpenAIMessages(
  messages: ChatMessage[],
  systemPrompt?: string
): ChatCompletionMessageParam[] {
  const out: ChatCompletionMessageParam[] = []
  if (systemPrompt) out.push({ role: 'system', content: systemPrompt })
  for (const m of messages) {
    switch (m.role) {
      case 'system':
        out.push({ role: 'system', content: m.content })
        break
      case 'assistant':
        out.push({ role: 'assistant', content: m.content })
        break
      case 'user':
        out.push({ role: 'user', content: m.content })
        break
    }
  }
  return out
}

function mapError(err: unknown, modelId: string): RemoteError {
  if (err instanceof RemoteError) return err

  if (err instanceof OpenAI.APIUserAbortError) {
    return new RemoteError(`${modelId} request aborted`, 'aborted', modelId, 'permanent')
  }
  if (err instanceof OpenAI.RateLimitError) {
    return new RemoteError(
      `${modelId} rate limit exceeded`,
      'rate_limited',
      modelId,
      'transient',
      parseRetryAfter(err.headers),
      429
    )
  }
  if (err instanceof OpenAI.AuthenticationError || err instanceof OpenAI.PermissionDeniedError) {
    return new RemoteError(
      `${modelId} authentication failed — check its credential`,
      'authentication_failed',
      modelId,
      'permanent',
      undefined,
      err.status
    )
  }
  if (
    err instanceof OpenAI.BadRequestError ||
    err instanceof OpenAI.NotFoundError ||
    err instanceof OpenAI.UnprocessableEntityError
  ) {
    return new RemoteError(err.message, 'invalid_request', modelId, 'permanent', undefined, err.status)
  }
  if (err instanceof OpenAI.APIConnectionTimeoutError) {
    return new RemoteError(`${modelId} request timed out`, 'timeout', modelId, 'transient')
  }
  if (err instanceof OpenAI.APIConnectionError) {
    return new RemoteError(`Network error connecting to ${modelId}`, 'network_error', modelId, 'transient')
  }
  if (err instanceof OpenAI.APIError) {
    const status = err.status
    if (status !== undefined && status >= 500) {
      return new RemoteError(
        `${modelId} service unavailable`,
        'provider_unavailable',
        modelId,
        'transient',
        parseRetryAfter(err.headers),
        status
      )
    }
    return new RemoteError(err.message, 'unknown', modelId, 'permanent', undefined, status)
  }
  if (err instanceof SyntaxError) {
    return new RemoteError(`${modelId} sent a malformed body`, 'malformed_response', modelId, 'transient')
  }

  return new RemoteError(errorMessage(err), 'unknown', modelId, 'permanent')
}

function parseRetryAfter(headers: Record<string, string | null | undefined> | undefined): number | undefined {
  const header = headers?.['retry-after']
  if (header) {
    const seconds = Number(header)
    if (!Number.isNaN(seconds)) return seconds * 1000
  }
  return undefined
}
