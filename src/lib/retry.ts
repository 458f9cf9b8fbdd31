/**
 * Backoff utilities for rate-limited API calls
 *
 * Throttling is retried with exponential backoff capped at a maximum wait.
 * Anything else fails on the first attempt.
 */

import type { BackoffConfig } from '../types.js'
import { DEFAULT_BACKOFF } from '../types.js'
import { isRateLimitError } from './errors.js'

export type Sleep = (ms: number) => Promise<void>

export const sleep: Sleep = (ms) => new Promise(resolve => setTimeout(resolve, ms))

/**
 * Delay before the retry that follows `attempt` (1-based): base, 2x, 4x ... capped
 */
export function backoffDelay(attempt: number, config: Pick<BackoffConfig, 'baseDelayMs' | 'maxDelayMs'>): number {
  const delay = config.baseDelayMs * Math.pow(2, attempt - 1)
  return Math.min(delay, config.maxDelayMs)
}

/**
 * Retry an async operation with exponential backoff
 *
 * @example
 * ```ts
 * const result = await withBackoff(
 *   () => api.putSecret(repo, name, sealed),
 *   { maxAttempts: 5, baseDelayMs: 1000, maxDelayMs: 30000 }
 * )
 * ```
 */
export async function withBackoff<T>(
  fn: () => Promise<T>,
  options: Partial<BackoffConfig> & {
    shouldRetry?: (error: unknown) => boolean
    /** Delay hint from the failed call (e.g. retry-after); still capped */
    delayHint?: (error: unknown) => number | undefined
    onRetry?: (attempt: number, error: unknown, delayMs: number) => void
    sleep?: Sleep
  } = {}
): Promise<T> {
  const {
    maxAttempts = DEFAULT_BACKOFF.maxAttempts,
    baseDelayMs = DEFAULT_BACKOFF.baseDelayMs,
    maxDelayMs = DEFAULT_BACKOFF.maxDelayMs,
    shouldRetry = isRateLimitError,
    delayHint = (error: unknown) => isRateLimitError(error) ? error.retryAfterMs : undefined,
    onRetry,
    sleep: wait = sleep
  } = options

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn()
    } catch (error) {
      if (attempt >= maxAttempts || !shouldRetry(error)) {
        throw error
      }

      const computed = backoffDelay(attempt, { baseDelayMs, maxDelayMs })
      const hinted = delayHint(error)
      const delay = Math.min(Math.max(computed, hinted ?? 0), maxDelayMs)

      onRetry?.(attempt, error, delay)
      await wait(delay)
    }
  }
}

/**
 * Per-batch rate-limit pressure
 *
 * Once a call in the batch was throttled, every following operation waits
 * first. The wait doubles while pressure persists and resets after a call
 * that went through without throttling.
 */
export class BatchThrottle {
  private pressure = 0
  private readonly config: Pick<BackoffConfig, 'baseDelayMs' | 'maxDelayMs'>
  private readonly wait: Sleep

  constructor(config: Pick<BackoffConfig, 'baseDelayMs' | 'maxDelayMs'>, wait: Sleep = sleep) {
    this.config = config
    this.wait = wait
  }

  /** Current delay inserted before the next operation (0 without pressure) */
  get delayMs(): number {
    return this.pressure === 0 ? 0 : backoffDelay(this.pressure, this.config)
  }

  noteThrottled(): void {
    this.pressure++
  }

  noteClean(): void {
    this.pressure = 0
  }

  async pause(): Promise<void> {
    const delay = this.delayMs
    if (delay > 0) {
      await this.wait(delay)
    }
  }
}
