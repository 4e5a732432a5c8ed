import { describe, it, expect } from 'vitest'
import type { CircuitOptions } from '../../src/ai/circuit-breaker'
import { ModelRegistry } from '../../src/ai/model-registry'
import {
  Orchestrator,
  type DispatchRequest,
  type OrchestratorOptions,
  type StreamEvent
} from '../../src/ai/orchestrator'
import { PerformanceMonitor } from '../../src/ai/performance-monitor'
import type { RetryPolicy } from '../../src/ai/retry-policy'
import type { ModelPlan, PlanRole } from '../../src/ai/task-router'
import {
  FakeModelClient,
  fail,
  hang,
  permanent,
  reply,
  transient
} from '../helpers/fake-model-client'

// ---------------------------------------------------------------------------
// Factories
// ---------------------------------------------------------------------------

const fastRetry: RetryPolicy = { maxAttempts: 3, baseDelayMs: 0, maxDelayMs: 0, factor: 2, jitter: 0 }

const request: DispatchRequest = {
  messages: (profile) => [{ role: 'user', content: `hello ${profile.id}` }],
  params: { temperature: 0.5, maxTokens: 100 }
}

function setup(
  clients: FakeModelClient[],
  options: OrchestratorOptions = {},
  circuit: CircuitOptions = { failureThreshold: 5, cooldownMs: 60_000 }
) {
  const registry = new ModelRegistry(circuit)
  for (const c of clients) registry.register(c)
  const monitor = new PerformanceMonitor()
  const orchestrator = new Orchestrator(registry, {
    retry: fastRetry,
    attemptTimeoutMs: 1_000,
    globalTimeoutMs: 2_000,
    monitor,
    random: () => 0.5,
    ...options
  })
  return { registry, monitor, orchestrator }
}

function makePlan(entries: Array<[string, PlanRole]>, multiModel = false): ModelPlan {
  return {
    category: 'coding',
    entries: entries.map(([modelId, role]) => ({ modelId, role })),
    multiModel,
    createdAt: 0
  }
}

async function collect(events: AsyncIterable<StreamEvent>): Promise<StreamEvent[]> {
  const out: StreamEvent[] = []
  for await (const e of events) out.push(e)
  return out
}

function textOf(events: StreamEvent[], modelId?: string): string {
  return events
    .map((e) => (e.type === 'chunk' && (modelId === undefined || e.modelId === modelId) ? e.content : ''))
    .join('')
}

function finals(events: StreamEvent[]) {
  return events.flatMap((e) => (e.type === 'final' ? [e] : []))
}

// ---------------------------------------------------------------------------
// execute
// ---------------------------------------------------------------------------

describe('Orchestrator.execute', () => {
  it('returns the primary model answer', async () => {
    const a = new FakeModelClient('a', [reply('Answer from a.', { confidence: 0.9 })])
    const { orchestrator } = setup([a])

    const { results, response } = await orchestrator.execute(makePlan([['a', 'primary']]), request)

    expect(results).toHaveLength(1)
    expect(results[0]).toMatchObject({ modelId: 'a', role: 'primary', status: 'success', attempts: 1 })
    expect(response).toMatchObject({
      content: 'Answer from a.',
      confidence: 0.9,
      contributingModels: ['a'],
      status: 'success'
    })
  })

  it('passes per-model messages and generation params to the client', async () => {
    const a = new FakeModelClient('a')
    const { orchestrator } = setup([a])

    await orchestrator.execute(makePlan([['a', 'primary']]), request)

    expect(a.calls).toHaveLength(1)
    expect(a.calls[0].messages).toEqual([{ role: 'user', content: 'hello a' }])
    expect(a.calls[0].temperature).toBe(0.5)
    expect(a.calls[0].maxTokens).toBe(100)
    expect(a.calls[0].signal).toBeInstanceOf(AbortSignal)
  })

  it('retries transient errors', async () => {
    const a = new FakeModelClient('a', [fail(transient('a')), reply('Recovered.')])
    const { orchestrator, registry } = setup([a])

    const { results, response } = await orchestrator.execute(makePlan([['a', 'primary']]), request)

    expect(results[0]).toMatchObject({ status: 'success', attempts: 2 })
    expect(response.content).toBe('Recovered.')
    expect(registry.health('a').consecutiveFailures).toBe(0)
  })

  it('treats an empty answer as a retryable malformed response', async () => {
    const a = new FakeModelClient('a', [reply('   '), reply('Real answer.')])
    const { orchestrator } = setup([a])

    const { results } = await orchestrator.execute(makePlan([['a', 'primary']]), request)
    expect(results[0]).toMatchObject({ status: 'success', attempts: 2, content: 'Real answer.' })
  })

  it('does not retry permanent errors and falls back to the next model', async () => {
    const a = new FakeModelClient('a', [fail(permanent('a'))])
    const b = new FakeModelClient('b', [reply('From b.')])
    const { orchestrator } = setup([a, b])

    const { results, response } = await orchestrator.execute(
      makePlan([
        ['a', 'primary'],
        ['b', 'fallback']
      ]),
      request
    )

    expect(a.calls).toHaveLength(1)
    expect(results.map((r) => [r.modelId, r.status, r.attempts])).toEqual([
      ['a', 'error', 1],
      ['b', 'success', 1]
    ])
    expect(results[0].error).toEqual({ code: 'invalid_request', message: 'a invalid_request' })
    expect(response.contributingModels).toEqual(['b'])
    expect(response.status).toBe('success')
  })

  it('stops retrying after the maximum attempts', async () => {
    const a = new FakeModelClient('a', [fail(transient('a'))])
    const b = new FakeModelClient('b')
    const { orchestrator } = setup([a, b])

    const { results } = await orchestrator.execute(
      makePlan([
        ['a', 'primary'],
        ['b', 'fallback']
      ]),
      request
    )

    expect(a.calls).toHaveLength(3)
    expect(results[0]).toMatchObject({ status: 'error', attempts: 3, error: { code: 'network_error' } })
    expect(results[1].status).toBe('success')
  })

  it('does not call fallbacks once a model succeeds', async () => {
    const a = new FakeModelClient('a')
    const b = new FakeModelClient('b')
    const { orchestrator } = setup([a, b])

    await orchestrator.execute(
      makePlan([
        ['a', 'primary'],
        ['b', 'fallback']
      ]),
      request
    )
    expect(b.calls).toHaveLength(0)
  })

  it('waits at least the retry-after hint', async () => {
    const a = new FakeModelClient('a', [fail(transient('a', 'rate_limited', 40)), reply('Later.')])
    const { orchestrator } = setup([a])

    const started = Date.now()
    const { results } = await orchestrator.execute(makePlan([['a', 'primary']]), request)

    expect(results[0].status).toBe('success')
    expect(Date.now() - started).toBeGreaterThanOrEqual(35)
  })

  it('reports an error result for a model that is not registered', async () => {
    const { orchestrator } = setup([])
    const { results, response } = await orchestrator.execute(makePlan([['ghost', 'primary']]), request)

    expect(results[0]).toMatchObject({
      modelId: 'ghost',
      status: 'error',
      attempts: 0,
      error: { code: 'unknown', message: 'Model "ghost" is not registered' }
    })
    expect(response.status).toBe('failure')
  })

  describe('deadlines', () => {
    it('times out a hanging attempt and retries it', async () => {
      const a = new FakeModelClient('a', [hang()])
      const b = new FakeModelClient('b', [reply('From b.')])
      const { orchestrator } = setup([a, b], { attemptTimeoutMs: 30 })

      const { results, response } = await orchestrator.execute(
        makePlan([
          ['a', 'primary'],
          ['b', 'fallback']
        ]),
        request
      )

      expect(a.calls).toHaveLength(3)
      expect(results[0]).toMatchObject({ status: 'timeout', attempts: 3, error: { code: 'timeout' } })
      expect(response.content).toBe('From b.')
    })

    it('fails with a timeout when the global deadline passes', async () => {
      const a = new FakeModelClient('a', [hang()])
      const { orchestrator } = setup([a], { globalTimeoutMs: 50 })

      const started = Date.now()
      const { results, response } = await orchestrator.execute(makePlan([['a', 'primary']]), request)

      expect(Date.now() - started).toBeLessThan(1_000)
      expect(results[0].status).toBe('timeout')
      expect(response.status).toBe('failure')
      expect(response.error?.code).toBe('timeout')
      expect(response.error?.message).toBe('No model answered before the deadline')
    })
  })

  describe('cancellation', () => {
    it('stops in-flight calls when the caller aborts', async () => {
      const a = new FakeModelClient('a', [hang()])
      const b = new FakeModelClient('b')
      const { orchestrator, registry } = setup([a, b])
      const controller = new AbortController()
      setTimeout(() => controller.abort(), 20)

      const { results, response } = await orchestrator.execute(
        makePlan([
          ['a', 'primary'],
          ['b', 'fallback']
        ]),
        request,
        { signal: controller.signal }
      )

      expect(results).toHaveLength(1)
      expect(results[0]).toMatchObject({ status: 'error', attempts: 1, error: { code: 'aborted' } })
      expect(b.calls).toHaveLength(0)
      expect(response.status).toBe('failure')
      expect(a.calls[0].signal?.aborted).toBe(true)
      // a cancelled call says nothing about model health
      expect(registry.health('a').consecutiveFailures).toBe(0)
    })

    it('dispatches nothing when the signal is already aborted', async () => {
      const a = new FakeModelClient('a')
      const { orchestrator } = setup([a])
      const controller = new AbortController()
      controller.abort()

      const { results, response } = await orchestrator.execute(makePlan([['a', 'primary']]), request, {
        signal: controller.signal
      })

      expect(results).toEqual([])
      expect(a.calls).toHaveLength(0)
      expect(response.error?.causes).toEqual(['no model was dispatched'])
    })
  })

  describe('circuit breaking', () => {
    it('skips a model whose circuit is open without recording it', async () => {
      const a = new FakeModelClient('a')
      const b = new FakeModelClient('b')
      const { orchestrator, registry, monitor } = setup([a, b])
      for (let i = 0; i < 5; i++) registry.recordOutcome('a', false, 1)

      const { results } = await orchestrator.execute(
        makePlan([
          ['a', 'primary'],
          ['b', 'fallback']
        ]),
        request
      )

      expect(a.calls).toHaveLength(0)
      expect(results[0]).toMatchObject({
        modelId: 'a',
        status: 'circuit-open',
        attempts: 0,
        error: { code: 'circuit_open', message: 'Circuit for a is open' }
      })
      expect(results[1].status).toBe('success')
      expect(monitor.list().map((r) => r.subject)).toEqual(['b'])
    })

    it('stops retrying once the circuit opens mid-request', async () => {
      const a = new FakeModelClient('a', [fail(transient('a'))])
      const { orchestrator, registry } = setup([a], {}, { failureThreshold: 2, cooldownMs: 60_000 })

      const { results } = await orchestrator.execute(makePlan([['a', 'primary']]), request)

      expect(a.calls).toHaveLength(2)
      expect(results[0]).toMatchObject({ status: 'error', attempts: 2 })
      expect(registry.health('a').state).toBe('open')
    })

    it('records every failed attempt against the circuit', async () => {
      const a = new FakeModelClient('a', [fail(transient('a'))])
      const { orchestrator, registry } = setup([a])

      await orchestrator.execute(makePlan([['a', 'primary']]), request)
      expect(registry.health('a').consecutiveFailures).toBe(3)
    })

    it('fails without dispatching when every planned model is open', async () => {
      const a = new FakeModelClient('a')
      const b = new FakeModelClient('b')
      const { orchestrator, registry } = setup([a, b])
      for (let i = 0; i < 5; i++) {
        registry.recordOutcome('a', false, 1)
        registry.recordOutcome('b', false, 1)
      }

      const { results, response } = await orchestrator.execute(
        makePlan([
          ['a', 'primary'],
          ['b', 'fallback']
        ]),
        request
      )

      expect(a.calls).toHaveLength(0)
      expect(b.calls).toHaveLength(0)
      expect(results.map((r) => [r.modelId, r.status])).toEqual([
        ['a', 'circuit-open'],
        ['b', 'circuit-open']
      ])
      expect(response.status).toBe('failure')
      expect(response.contributingModels).toEqual([])
    })

    it('falls back after exhausting retries and charges every attempt to the failing model', async () => {
      const a = new FakeModelClient('a', [fail(transient('a'))])
      const b = new FakeModelClient('b', [reply('b answer')])
      const { orchestrator, registry } = setup([a, b])

      const { results, response } = await orchestrator.execute(
        makePlan([
          ['a', 'primary'],
          ['b', 'fallback']
        ]),
        request
      )

      expect(a.calls).toHaveLength(3)
      expect(results[0]).toMatchObject({ modelId: 'a', status: 'error', attempts: 3 })
      expect(response.status).toBe('success')
      expect(response.content).toBe('b answer')
      expect(response.contributingModels).toEqual(['b'])
      expect(registry.health('a').consecutiveFailures).toBe(3)
      expect(registry.health('b').consecutiveFailures).toBe(0)
    })

    it('keeps the trial lease held when an older non-trial call is cancelled', async () => {
      let now = 0
      const a = new FakeModelClient('a', [hang()])
      const { orchestrator, registry } = setup([a], {}, { failureThreshold: 1, cooldownMs: 10, now: () => now })
      const controller = new AbortController()

      const pending = orchestrator.execute(makePlan([['a', 'primary']]), request, { signal: controller.signal })
      expect(a.calls).toHaveLength(1)

      registry.recordOutcome('a', false, 1)
      now = 20
      expect(registry.acquire('a')).toEqual({ granted: true, trial: true })

      controller.abort()
      await pending

      expect(registry.acquire('a')).toEqual({ granted: false, reason: 'trial-in-flight' })
    })

    it('frees the trial lease when the trial call itself is cancelled', async () => {
      let now = 0
      const a = new FakeModelClient('a', [hang()])
      const { orchestrator, registry } = setup([a], {}, { failureThreshold: 1, cooldownMs: 10, now: () => now })
      registry.recordOutcome('a', false, 1)
      now = 20
      const controller = new AbortController()

      const pending = orchestrator.execute(makePlan([['a', 'primary']]), request, { signal: controller.signal })
      expect(registry.health('a').state).toBe('half-open')
      expect(registry.acquire('a')).toEqual({ granted: false, reason: 'trial-in-flight' })

      controller.abort()
      await pending

      expect(registry.acquire('a')).toEqual({ granted: true, trial: true })
    })
  })

  describe('multi-model plans', () => {
    const multi = makePlan(
      [
        ['a', 'primary'],
        ['b', 'primary'],
        ['c', 'fallback']
      ],
      true
    )

    it('runs every primary and merges differing answers', async () => {
      const a = new FakeModelClient('a', [reply('Use recursion.', { confidence: 0.9 })])
      const b = new FakeModelClient('b', [reply('Use an explicit stack.', { confidence: 0.8 })])
      const c = new FakeModelClient('c')
      const { orchestrator } = setup([a, b, c])

      const { results, response } = await orchestrator.execute(multi, request)

      expect(results.map((r) => r.modelId)).toEqual(['a', 'b'])
      expect(c.calls).toHaveLength(0)
      expect(response.content).toBe('### a\nUse recursion.\n\n### b\nUse an explicit stack.')
      expect(response.contributingModels).toEqual(['a', 'b'])
      expect(response.status).toBe('success')
    })

    it('starts primaries concurrently', async () => {
      const a = new FakeModelClient('a', [reply('Slow a.', { delayMs: 60 })])
      const b = new FakeModelClient('b', [reply('Slow b answer here.', { delayMs: 60 })])
      const { orchestrator } = setup([a, b])

      const pending = orchestrator.execute(multi, request)
      await new Promise((resolve) => setTimeout(resolve, 10))
      expect(a.calls).toHaveLength(1)
      expect(b.calls).toHaveLength(1)
      await pending
    })

    it('returns a partial response when one primary fails', async () => {
      const a = new FakeModelClient('a', [reply('Only a.')])
      const b = new FakeModelClient('b', [fail(permanent('b'))])
      const c = new FakeModelClient('c')
      const { orchestrator } = setup([a, b, c])

      const { response } = await orchestrator.execute(multi, request)

      expect(response.status).toBe('partial')
      expect(response.contributingModels).toEqual(['a'])
      expect(c.calls).toHaveLength(0)
    })

    it('falls back sequentially when every primary fails', async () => {
      const a = new FakeModelClient('a', [fail(permanent('a'))])
      const b = new FakeModelClient('b', [fail(permanent('b'))])
      const c = new FakeModelClient('c', [reply('Rescue.')])
      const { orchestrator } = setup([a, b, c])

      const { results, response } = await orchestrator.execute(multi, request)

      expect(results.map((r) => `${r.modelId}:${r.status}`)).toEqual(['a:error', 'b:error', 'c:success'])
      expect(response.content).toBe('Rescue.')
      expect(response.status).toBe('partial')
    })
  })

  it('records one performance entry per invoked model', async () => {
    const a = new FakeModelClient('a', [fail(permanent('a'))])
    const b = new FakeModelClient('b')
    const { orchestrator, monitor } = setup([a, b])

    await orchestrator.execute(
      makePlan([
        ['a', 'primary'],
        ['b', 'fallback']
      ]),
      request
    )

    expect(monitor.list().map((r) => [r.subject, r.success, r.category])).toEqual([
      ['a', false, 'coding'],
      ['b', true, 'coding']
    ])
    expect(monitor.list()[0].errorCode).toBe('invalid_request')
    expect(monitor.aggregate().byError).toEqual({ invalid_request: 1 })
  })
})

// ---------------------------------------------------------------------------
// stream
// ---------------------------------------------------------------------------

describe('Orchestrator.stream', () => {
  it('streams single-model chunks as they arrive and ends with one final event', async () => {
    const a = new FakeModelClient('a', [reply('Hello world.', { chunks: ['Hello ', 'world.'] })])
    const { orchestrator } = setup([a])

    const events = await collect(orchestrator.stream(makePlan([['a', 'primary']]), request))

    expect(events.slice(0, 2)).toEqual([
      { type: 'chunk', modelId: 'a', content: 'Hello ' },
      { type: 'chunk', modelId: 'a', content: 'world.' }
    ])
    const final = finals(events)
    expect(final).toHaveLength(1)
    expect(events[events.length - 1]).toBe(final[0])
    expect(final[0].response).toMatchObject({ content: 'Hello world.', status: 'success', contributingModels: ['a'] })
  })

  it('merges multi-model streams on sentence boundaries', async () => {
    const a = new FakeModelClient('a', [reply('A one. A two.', { chunks: ['A one. A tw', 'o.'] })])
    const b = new FakeModelClient('b', [reply('B says something else.', { chunks: ['B says ', 'something else.'] })])
    const { orchestrator } = setup([a, b])
    const plan = makePlan(
      [
        ['a', 'primary'],
        ['b', 'primary']
      ],
      true
    )

    const events = await collect(orchestrator.stream(plan, request))

    expect(textOf(events, 'a')).toBe('A one. A two.')
    expect(textOf(events, 'b')).toBe('B says something else.')
    const chunksA = events.flatMap((e) => (e.type === 'chunk' && e.modelId === 'a' ? [e.content] : []))
    expect(chunksA).toEqual(['A one. ', 'A two.'])
    expect(finals(events)[0].response.contributingModels).toEqual(['a', 'b'])
  })

  it('falls back to the next model when the first fails before any text', async () => {
    const a = new FakeModelClient('a', [fail(permanent('a'))])
    const b = new FakeModelClient('b', [reply('From b.')])
    const { orchestrator } = setup([a, b])

    const events = await collect(
      orchestrator.stream(
        makePlan([
          ['a', 'primary'],
          ['b', 'fallback']
        ]),
        request
      )
    )

    expect(textOf(events)).toBe('From b.')
    expect(finals(events)[0].response.contributingModels).toEqual(['b'])
  })

  it('commits to a model once it has streamed text', async () => {
    const a = new FakeModelClient('a', [fail(transient('a'), { chunks: ['Partial '] })])
    const b = new FakeModelClient('b')
    const { orchestrator } = setup([a, b])

    const events = await collect(
      orchestrator.stream(
        makePlan([
          ['a', 'primary'],
          ['b', 'fallback']
        ]),
        request
      )
    )

    expect(a.calls).toHaveLength(1)
    expect(b.calls).toHaveLength(0)
    expect(textOf(events)).toBe('Partial ')
    const [final] = finals(events)
    expect(final.response.status).toBe('failure')
    expect(final.results.map((r) => `${r.modelId}:${r.status}`)).toEqual(['a:error'])
  })

  it('cancels in-flight calls when the consumer stops early', async () => {
    const a = new FakeModelClient('a', [
      reply('one two three', { chunks: ['one ', 'two ', 'three'], delayMs: 20 })
    ])
    const { orchestrator, registry } = setup([a])

    const seen: StreamEvent[] = []
    for await (const event of orchestrator.stream(makePlan([['a', 'primary']]), request)) {
      seen.push(event)
      break
    }

    expect(seen).toEqual([{ type: 'chunk', modelId: 'a', content: 'one ' }])
    expect(a.calls[0].signal?.aborted).toBe(true)
    expect(registry.health('a').consecutiveFailures).toBe(0)
  })

  it('ends with a failure event when the caller aborts mid-stream', async () => {
    const a = new FakeModelClient('a', [hang()])
    const { orchestrator } = setup([a])
    const controller = new AbortController()
    setTimeout(() => controller.abort(), 20)

    const events = await collect(
      orchestrator.stream(makePlan([['a', 'primary']]), request, { signal: controller.signal })
    )

    expect(events).toHaveLength(1)
    const [final] = finals(events)
    expect(final.response.status).toBe('failure')
    expect(final.results[0].error?.code).toBe('aborted')
  })
})
