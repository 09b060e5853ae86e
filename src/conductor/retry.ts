// src/conductor/retry.ts — Bounded retry with exponential backoff and jitter

import { ConductorError, toError } from "./errors.js"
import type { ConductorLogger } from "./logger.js"
import type { RetryPolicy } from "./types.js"
import { DEFAULT_RETRY_POLICY } from "./types.js"

export interface RetryControllerOptions {
  sleep?: (ms: number) => Promise<void>
  /** Uniform random source in [0, 1) */
  random?: () => number
  logger?: ConductorLogger
}

export class RetryController {
  readonly policy: RetryPolicy
  private readonly sleep: (ms: number) => Promise<void>
  private readonly random: () => number
  private readonly logger: ConductorLogger

  constructor(policy: Partial<RetryPolicy> = {}, options: RetryControllerOptions = {}) {
    this.policy = { ...DEFAULT_RETRY_POLICY, ...policy }
    this.sleep = options.sleep ?? ((ms) => new Promise(resolve => setTimeout(resolve, ms)))
    this.random = options.random ?? Math.random
    this.logger = options.logger ?? console
  }

  /** Delay before attempt `attempt` (0-indexed, >= 1), before jitter */
  baseDelay(attempt: number): number {
    const exponential = this.policy.baseDelayMs * Math.pow(this.policy.multiplier, attempt - 1)
    return Math.min(exponential, this.policy.maxDelayMs)
  }

  /** Delay before attempt `attempt`, with jitter scaling into [0.5, 1.0] of the base delay */
  computeDelay(attempt: number): number {
    const delay = this.baseDelay(attempt)
    if (!this.policy.jitter) return delay
    return delay * (0.5 + this.random() * 0.5)
  }

  /**
   * Run `operation` up to `maxAttempts` times. Non-retryable conductor errors
   * propagate at once; the last failure propagates without a trailing sleep.
   */
  async execute<T>(operation: () => Promise<T>, maxAttempts: number = this.policy.maxAttempts): Promise<T> {
    const attempts = Math.max(1, maxAttempts)
    let lastError: Error | undefined

    for (let attempt = 0; attempt < attempts; attempt++) {
      if (attempt > 0) {
        const delay = this.computeDelay(attempt)
        this.logger.warn(
          `[retry] attempt ${attempt + 1}/${attempts} after ${Math.round(delay)}ms: ${lastError?.message ?? "unknown error"}`,
        )
        await this.sleep(delay)
      }

      try {
        return await operation()
      } catch (err) {
        lastError = toError(err)
        if (!isRetryable(lastError)) throw lastError
      }
    }

    throw lastError ?? new Error("Retry attempts exhausted")
  }
}

function isRetryable(err: Error): boolean {
  return err instanceof ConductorError ? err.retryable : true
}
