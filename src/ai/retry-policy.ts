// ---------------------------------------------------------------------------
// Retry Policy — bounded exponential backoff with jitter
// ---------------------------------------------------------------------------

import { setTimeout as delay } from 'node:timers/promises'

export interface RetryPolicy {
  /** Total attempts per model, including the first. */
  maxAttempts: number
  baseDelayMs: number
  maxDelayMs: number
  factor: number
  /** Fractional spread applied to each delay, in [0,1]. */
  jitter: number
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxAttempts: 3,
  baseDelayMs: 500,
  maxDelayMs: 8_000,
  factor: 2,
  jitter: 0.2
}

/**
 * Delay before the attempt that follows failed attempt `attempt` (1-based).
 * A server-provided retry-after hint can only lengthen the wait.
 */
export function backoffDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
  retryAfterMs?: number
): number {
  const exponential = policy.baseDelayMs * Math.pow(policy.factor, Math.max(0, attempt - 1))
  const capped = Math.min(policy.maxDelayMs, exponential)
  const spread = 1 - policy.jitter + 2 * policy.jitter * random()
  const jittered = Math.round(capped * spread)
  return retryAfterMs !== undefined ? Math.max(jittered, retryAfterMs) : jittered
}

/** Sleep that rejects with an AbortError as soon as the signal fires. */
export async function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  if (ms <= 0) return
  await delay(ms, undefined, { signal })
}
