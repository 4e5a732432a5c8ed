// ---------------------------------------------------------------------------
// Claude Client — Anthropic SDK implementation of ModelClient
// ---------------------------------------------------------------------------

import Anthropic from '@anthropic-ai/sdk'
import type { MessageParam } from '@anthropic-ai/sdk/resources/messages/messages'
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

const DEFAULT_MAX_TOKENS = 4096

export class ClaudeClient implements ModelClient {
  private client: Anthropic | null = null

  constructor(
    readonly profile: ModelProfile,
    private credentials: CredentialProvider
  ) {}

  /** Invalidate the cached client (e.g. after API key change). */
  resetClient(): void {
    this.client = null
  }

  // ---------------------------------------------------------------------------
  // Core operations
  // ---------------------------------------------------------------------------

  async generate(request: GenerationRequest): Promise<Generation> {
    const client = await this.ensureClient()

    let response: Anthropic.Message
    try {
      response = await client.messages.create(
        {
          model: this.profile.apiModel,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages: toAnthropicMessages(request.messages),
          system: systemPrompt(request),
          temperature: request.temperature,
          top_p: request.topP
        },
        { signal: request.signal }
      )
    } catch (err) {
      throw mapError(err, this.profile.id)
    }

    const text = response.content
      .filter((b): b is Anthropic.TextBlock => b.type === 'text')
      .map((b) => b.text)
      .join('')

    return {
      content: text,
      model: response.model,
      confidence: estimateConfidence(text),
      inputTokens: response.usage.input_tokens,
      outputTokens: response.usage.output_tokens
    }
  }

  async *stream(request: GenerationRequest): AsyncIterable<StreamChunk> {
    const client = await this.ensureClient()

    try {
      const messageStream = client.messages.stream(
        {
          model: this.profile.apiModel,
          max_tokens: request.maxTokens ?? DEFAULT_MAX_TOKENS,
          messages: toAnthropicMessages(request.messages),
          system: systemPrompt(request),
          temperature: request.temperature,
          top_p: request.topP
        },
        { signal: request.signal }
      )

      for await (const event of messageStream) {
        if (event.type === 'content_block_delta' && event.delta.type === 'text_delta') {
          yield { type: 'text', content: event.delta.text }
        }
      }

      const final = await messageStream.finalMessage()
      yield {
        type: 'done',
        model: final.model,
        inputTokens: final.usage.input_tokens,
        outputTokens: final.usage.output_tokens
      }
    } catch (err) {
      throw mapError(err, this.profile.id)
    }
  }

  // ---------------------------------------------------------------------------
  // Status
  // ---------------------------------------------------------------------------

  async isAvailable(): Promise<boolean> {
    const key = await this.credentials.resolve(this.profile.credential)
    return key !== null && key.length > 0
  }

  // ---------------------------------------------------------------------------
  // Internal helpers
  // ---------------------------------------------------------------------------

  private async ensureClient(): Promise<Anthropic> {
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

    this.client = new Anthropic({ apiKey, baseURL: this.profile.endpoint, maxRetries: 0 })
    return this.client
  }
}

// ---------------------------------------------------------------------------
// Utilities
// ---------------------------------------------------------------------------

type ConversationMessage = ChatMessage & { role: 'user' | 'assistant' }

function isConversationMessage(m: ChatMessage): m is ConversationMessage {
  return m.role !== 'system'
}

/** System messages travel in the top-level `system` field, not the message list. */
function toAnthropicMessages(messages: ChatMessage[]): MessageParam[] {
  return messages
    .filter(isConversationMessage)
    .map((m) => ({ role: m.role, content: m.content }))
}

function systemPrompt(request: GenerationRequest): string | undefined {
  const parts = request.messages.filter((m) => m.role === 'system').map((m) => m.content)
  if (request.systemPrompt) parts.unshift(request.systemPrompt)
  return parts.length > 0 ? parts.join('\n\n') : undefined
}

function mapError(err: unknown, modelId: string): RemoteError {
  if (err instanceof RemoteError) return err

  if (err instanceof Anthropic.APIUserAbortError) {
    return new RemoteError(`${modelId} request aborted`, 'aborted', modelId, 'permanent')
  }
  if (err instanceof Anthropic.RateLimitError) {
    return new RemoteError(
      `${modelId} rate limit exceeded`,
      'rate_limited',
      modelId,
      'transient',
      parseRetryAfter(err.headers),
      429
    )
  }
  if (err instanceof Anthropic.AuthenticationError || err instanceof Anthropic.PermissionDeniedError) {
    return new RemoteError(
      `${modelId} authentication failed — check your API key`,
      'authentication_failed',
      modelId,
      'permanent',
      undefined,
      err.status
    )
  }
  if (
    err instanceof Anthropic.BadRequestError ||
    err instanceof Anthropic.NotFoundError ||
    err instanceof Anthropic.UnprocessableEntityError
  ) {
    return new RemoteError(err.message, 'invalid_request', modelId, 'permanent', undefined, err.status)
  }
  if (err instanceof Anthropic.InternalServerError) {
    return new RemoteError(
      `${modelId} service unavailable`,
      'provider_unavailable',
      modelId,
      'transient',
      undefined,
      err.status
    )
  }
  if (err instanceof Anthropic.APIConnectionTimeoutError) {
    return new RemoteError(`${modelId} request timed out`, 'timeout', modelId, 'transient')
  }
  if (err instanceof Anthropic.APIConnectionError) {
    return new RemoteError(`Network error connecting to ${modelId}`, 'network_error', modelId, 'transient')
  }
  if (err instanceof Anthropic.APIError) {
    const status = err.status
    if (status !== undefined && status >= 500) {
      return new RemoteError(err.message, 'provider_unavailable', modelId, 'transient', undefined, status)
    }
    return new RemoteError(err.message, 'unknown', modelId, 'permanent', undefined, status)
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
