/**
 * Scripted ModelClient for orchestration tests. Each call (generate or
 * stream) consumes the next step; the last step repeats once the script
 * runs out. Every wait honours the request's abort signal.
 */

import { RemoteError, type RemoteErrorCode } from '../../src/ai/errors'
import {
  estimateConfidence,
  type Generation,
  type GenerationRequest,
  type ModelClient,
  type ModelProfile,
  type StreamChunk
} from '../../src/ai/model-interface'

export type FakeStep =
  | { kind: 'reply'; content: string; confidence?: number; delayMs?: number; chunks?: string[] }
  | { kind: 'fail'; error: Error; delayMs?: number; chunks?: string[] }
  | { kind: 'hang' }

export function reply(
  content: string,
  extra: { confidence?: number; delayMs?: number; chunks?: string[] } = {}
): FakeStep {
  return { kind: 'reply', content, ...extra }
}

export function fail(error: Error, extra: { delayMs?: number; chunks?: string[] } = {}): FakeStep {
  return { kind: 'fail', error, ...extra }
}

export function hang(): FakeStep {
  return { kind: 'hang' }
}

export function transient(modelId: string, code: RemoteErrorCode = 'network_error', retryAfterMs?: number) {
  return new RemoteError(`${modelId} ${code}`, code, modelId, 'transient', retryAfterMs)
}

export function permanent(modelId: string, code: RemoteErrorCode = 'invalid_request') {
  return new RemoteError(`${modelId} ${code}`, code, modelId, 'permanent')
}

export function makeProfile(id: string, overrides: Partial<ModelProfile> = {}): ModelProfile {
  return {
    id,
    name: id,
    backend: 'openai-compatible',
    apiModel: `${id}-model`,
    credential: 'TEST_KEY',
    capabilities: ['general'],
    specialization: {},
    reliability: 1,
    contextWindow: 32_000,
    ...overrides
  }
}

export class FakeModelClient implements ModelClient {
  readonly profile: ModelProfile
  readonly calls: GenerationRequest[] = []
  available = true

  constructor(
    profileOrId: ModelProfile | string,
    private steps: FakeStep[] = []
  ) {
    this.profile = typeof profileOrId === 'string' ? makeProfile(profileOrId) : profileOrId
  }

  script(...steps: FakeStep[]): this {
    this.steps = steps
    return this
  }

  async generate(request: GenerationRequest): Promise<Generation> {
    this.calls.push(request)
    const step = this.nextStep()

    if (step.kind === 'hang') return waitForAbort(request.signal)
    await wait(step.delayMs ?? 0, request.signal)
    if (step.kind === 'fail') throw step.error

    return {
      content: step.content,
      model: this.profile.apiModel,
      confidence: step.confidence ?? estimateConfidence(step.content),
      inputTokens: 10,
      outputTokens: 20
    }
  }

  async *stream(request: GenerationRequest): AsyncGenerator<StreamChunk> {
    this.calls.push(request)
    const step = this.nextStep()

    if (step.kind === 'hang') {
      await waitForAbort(request.signal)
      return
    }

    const chunks = step.chunks ?? (step.kind === 'reply' ? [step.content] : [])
    for (const content of chunks) {
      await wait(step.delayMs ?? 0, request.signal)
      yield { type: 'text', content }
    }
    if (step.kind === 'fail') {
      await wait(step.delayMs ?? 0, request.signal)
      throw step.error
    }
    yield { type: 'done', model: this.profile.apiModel, inputTokens: 10, outputTokens: 20 }
  }

  async isAvailable(): Promise<boolean> {
    return this.available
  }

  private nextStep(): FakeStep {
    if (this.steps.length > 1) {
      const [step] = this.steps.splice(0, 1)
      return step
    }
    return this.steps[0] ?? reply(`${this.profile.id} answer`)
  }
}

function abortError(): Error {
  return new Error('request aborted')
}

function wait(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(abortError())
      return
    }
    if (ms <= 0) {
      resolve()
      return
    }
    const onAbort = (): void => {
      clearTimeout(timer)
      reject(abortError())
    }
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort)
      resolve()
    }, ms)
    signal?.addEventListener('abort', onAbort, { once: true })
  })
}

function waitForAbort(signal?: AbortSignal): Promise<never> {
  return new Promise((_resolve, reject) => {
    if (!signal) return
    if (signal.aborted) reject(abortError())
    else signal.addEventListener('abort', () => reject(abortError()), { once: true })
  })
}
