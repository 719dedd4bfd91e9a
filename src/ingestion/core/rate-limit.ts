/**
 * Rate Limiting and Exponential Backoff
 *
 * Request admission for the upstream trade source and bounded retries for
 * transient failures. Both are shared by every request of a run.
 */

import type { IngestionConfig } from '@/config/schemas'
import { createLogger } from '@/utils/logger'
import { HttpStatusError, isRetryableError, toErrorMessage } from './errors'

const log = createLogger('http')

/**
 * Configuration for rate limiting and retry behavior.
 */
export interface RateLimitConfig {
  /** Maximum requests per second */
  requestsPerSecond: number
  /** Maximum number of attempts per request, first attempt included */
  maxAttempts: number
  /** Initial backoff delay in milliseconds */
  initialBackoffMs: number
  /** Maximum backoff delay in milliseconds */
  maxBackoffMs: number
}

/**
 * Default rate limit configuration.
 */
export const DEFAULT_RATE_LIMIT_CONFIG: RateLimitConfig = {
  requestsPerSecond: 10,
  maxAttempts: 3,
  initialBackoffMs: 1000,
  maxBackoffMs: 30000,
}

/**
 * Map the ingestion tunables onto limiter and retry settings.
 */
export function toRateLimitConfig(
  config: Pick<IngestionConfig, 'requestsPerSecond' | 'maxAttempts' | 'retryBaseDelayMs' | 'maxBackoffMs'>,
): RateLimitConfig {
  return {
    requestsPerSecond: config.requestsPerSecond,
    maxAttempts: config.maxAttempts,
    initialBackoffMs: config.retryBaseDelayMs,
    maxBackoffMs: config.maxBackoffMs,
  }
}

/**
 * Sleep utility function.
 * @param ms - Milliseconds to sleep
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Rate limiter that throttles requests to a maximum rate.
 *
 * Grants are spaced at least 1000 / requestsPerSecond ms apart, measured
 * from the previous actual grant. Callers queue on a promise chain and are
 * admitted one at a time in arrival order, so concurrent callers can never
 * observe the same free slot.
 */
export class RateLimiter {
  private lastGrant: number | null = null
  private tail: Promise<void> = Promise.resolve()
  private config: RateLimitConfig

  constructor(config: Partial<RateLimitConfig> = {}) {
    this.config = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config }
    if (!(this.config.requestsPerSecond > 0)) {
      throw new RangeError(`requestsPerSecond must be positive, got ${this.config.requestsPerSecond}`)
    }
  }

  /**
   * Get the current configuration.
   */
  getConfig(): RateLimitConfig {
    return { ...this.config }
  }

  /**
   * Wait until one request may be issued.
   * Call this before making a request.
   */
  acquire(): Promise<void> {
    const turn = this.tail.then(() => this.waitForSlot())
    this.tail = turn
    return turn
  }

  /**
   * Reset the rate limiter state.
   * Useful for testing or after long pauses.
   */
  reset(): void {
    this.lastGrant = null
  }

  private async waitForSlot(): Promise<void> {
    if (this.lastGrant !== null) {
      const target = this.lastGrant + 1000 / this.config.requestsPerSecond
      // Timers may fire a little early; re-check against the clock
      let now = Date.now()
      while (now < target) {
        await sleep(target - now)
        now = Date.now()
      }
    }

    this.lastGrant = Date.now()
  }
}

/**
 * Calculate backoff delay for a given attempt using exponential backoff with jitter.
 *
 * @param attempt - The current attempt number (0-indexed)
 * @param config - Rate limit configuration
 * @returns Delay in milliseconds
 */
export function calculateBackoff(
  attempt: number,
  config: Pick<RateLimitConfig, 'initialBackoffMs' | 'maxBackoffMs'>,
): number {
  // Exponential backoff: initialBackoff * 2^attempt
  const exponentialDelay = config.initialBackoffMs * Math.pow(2, attempt)

  const cappedDelay = Math.min(exponentialDelay, config.maxBackoffMs)

  // Jitter (0-25% of delay) spreads out retries of parallel callers
  const jitter = Math.random() * 0.25 * cappedDelay

  return Math.floor(cappedDelay + jitter)
}

/**
 * Calculate backoff for HTTP 429 responses.
 * A server-provided Retry-After (seconds) wins over the exponential schedule,
 * still capped at maxBackoffMs.
 *
 * @param attempt - The current attempt number (0-indexed)
 * @param config - Rate limit configuration
 * @param retryAfterHeader - Value of Retry-After header, if present
 * @returns Delay in milliseconds
 */
export function calculateRateLimitBackoff(
  attempt: number,
  config: Pick<RateLimitConfig, 'initialBackoffMs' | 'maxBackoffMs'>,
  retryAfterHeader?: string | null,
): number {
  if (retryAfterHeader) {
    const retryAfterSeconds = parseInt(retryAfterHeader, 10)
    if (!isNaN(retryAfterSeconds) && retryAfterSeconds > 0) {
      return Math.min(retryAfterSeconds * 1000, config.maxBackoffMs)
    }
  }

  return calculateBackoff(attempt, config)
}

// ============================================================================
// Retrying Transport
// ============================================================================

/**
 * Outcome of one logical request. Failures are values, not exceptions.
 */
export type TransportResult<T> =
  | { ok: true; value: T; attempts: number; retries: number }
  | {
      ok: false
      error: Error
      attempts: number
      retries: number
      /** True when every attempt was spent on retryable failures */
      exhausted: boolean
    }

export interface TransportStats {
  /** Logical requests executed */
  requests: number
  /** Attempts made, retries included */
  attempts: number
  /** Retries made */
  retries: number
  /** Logical requests that ended in failure */
  failures: number
}

/**
 * Wraps one upstream call with rate limiting and bounded retries.
 *
 * Every attempt acquires the rate limiter first. Retryable failures
 * (network errors, 429/5xx, degraded source responses) back off
 * exponentially; after maxAttempts the failure is returned to the caller.
 */
export class RetryingTransport {
  readonly stats: TransportStats = { requests: 0, attempts: 0, retries: 0, failures: 0 }

  private readonly config: RateLimitConfig

  constructor(
    private readonly rateLimiter: RateLimiter,
    config: Partial<RateLimitConfig> = {},
  ) {
    this.config = { ...DEFAULT_RATE_LIMIT_CONFIG, ...config }
  }

  async execute<T>(label: string, request: () => Promise<T>): Promise<TransportResult<T>> {
    const { maxAttempts } = this.config
    let retries = 0
    let lastError: Error | null = null

    this.stats.requests++

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      await this.rateLimiter.acquire()
      this.stats.attempts++

      try {
        const value = await request()
        return { ok: true, value, attempts: attempt + 1, retries }
      } catch (error) {
        lastError = error instanceof Error ? error : new Error(String(error))

        if (!isRetryableError(error)) {
          this.stats.failures++
          log.warn('Request failed with non-retryable error', { label, attempt: attempt + 1 }, error)
          return { ok: false, error: lastError, attempts: attempt + 1, retries, exhausted: false }
        }

        if (attempt === maxAttempts - 1) {
          break
        }

        const backoffMs =
          error instanceof HttpStatusError && error.status === 429
            ? calculateRateLimitBackoff(attempt, this.config, error.retryAfter)
            : calculateBackoff(attempt, this.config)

        log.warn('Retrying request', {
          label,
          attempt: attempt + 1,
          maxAttempts,
          backoffMs,
          reason: toErrorMessage(error),
        })

        retries++
        this.stats.retries++
        await sleep(backoffMs)
      }
    }

    this.stats.failures++
    const error = lastError ?? new Error(`${label}: no attempts made`)
    log.error('Request failed after all retries', { label, attempts: maxAttempts }, error)

    return { ok: false, error, attempts: maxAttempts, retries, exhausted: true }
  }
}
