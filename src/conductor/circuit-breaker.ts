// src/conductor/circuit-breaker.ts — Three-state circuit breaker, one per logical model

import { ConductorError } from "./errors.js"
import type { ConductorLogger } from "./logger.js"

export type CircuitState = "closed" | "open" | "half_open"

export interface CircuitBreakerConfig {
  failureThreshold: number  // Default: 5
  timeoutMs: number         // Default: 60_000
}

export const DEFAULT_BREAKER_CONFIG: CircuitBreakerConfig = {
  failureThreshold: 5,
  timeoutMs: 60_000,
}

export interface CircuitBreakerStats {
  state: CircuitState
  failureCount: number
  successCount: number
  lastFailure?: number
  lastSuccess?: number
  probes: number
}

export type TransitionListener = (name: string, from: CircuitState, to: CircuitState) => void

export class CircuitBreaker {
  private state: CircuitState = "closed"
  private failureCount = 0
  private successCount = 0
  private lastFailure: number | undefined
  private lastSuccess: number | undefined
  private probes = 0
  private probeInFlight = false
  private onStateChange?: TransitionListener

  constructor(
    readonly name: string,
    private readonly config: CircuitBreakerConfig = DEFAULT_BREAKER_CONFIG,
    private readonly clock: () => number = Date.now,
  ) {}

  /** Register a callback for state changes. */
  onTransition(cb: TransitionListener): void {
    this.onStateChange = cb
  }

  /**
   * Execute a function with circuit breaker protection.
   * Admission is decided synchronously, before the first suspension point,
   * so concurrent callers observe a consistent state.
   */
  async execute<T>(fn: () => Promise<T>): Promise<T> {
    if (this.admit() === "probe") {
      return this.executeProbe(fn)
    }
    return this.executePassThrough(fn)
  }

  getState(): CircuitState {
    return this.state
  }

  getStats(): CircuitBreakerStats {
    return {
      state: this.state,
      failureCount: this.failureCount,
      successCount: this.successCount,
      lastFailure: this.lastFailure,
      lastSuccess: this.lastSuccess,
      probes: this.probes,
    }
  }

  /** Manual reset to closed state. */
  reset(): void {
    this.transition("closed")
    this.failureCount = 0
    this.probeInFlight = false
  }

  private admit(): "pass" | "probe" {
    if (this.state === "open") {
      const sinceFailure = this.clock() - (this.lastFailure ?? 0)
      if (sinceFailure <= this.config.timeoutMs) {
        throw this.openError(this.config.timeoutMs - sinceFailure)
      }
      this.transition("half_open")
    }

    if (this.state === "half_open") {
      // Exactly one trial call at a time
      if (this.probeInFlight) throw this.openError(0)
      this.probeInFlight = true
      return "probe"
    }

    return "pass"
  }

  private async executePassThrough<T>(fn: () => Promise<T>): Promise<T> {
    try {
      const result = await fn()
      this.successCount++
      this.lastSuccess = this.clock()
      return result
    } catch (err) {
      this.failureCount++
      this.lastFailure = this.clock()
      if (this.state === "closed" && this.failureCount >= this.config.failureThreshold) {
        this.transition("open")
      }
      throw err
    }
  }

  private async executeProbe<T>(fn: () => Promise<T>): Promise<T> {
    this.probes++
    try {
      const result = await fn()
      this.transition("closed")
      this.failureCount = 0
      this.successCount++
      this.lastSuccess = this.clock()
      return result
    } catch (err) {
      this.failureCount++
      this.lastFailure = this.clock()
      this.transition("open")
      throw err
    } finally {
      this.probeInFlight = false
    }
  }

  private openError(retryAfterMs: number): ConductorError {
    return new ConductorError("BREAKER_OPEN", `Circuit breaker OPEN for model "${this.name}"`, {
      model: this.name,
      retryAfterMs: Math.max(0, retryAfterMs),
    })
  }

  private transition(to: CircuitState): void {
    const from = this.state
    if (from === to) return
    this.state = to
    this.onStateChange?.(this.name, from, to)
  }
}

// --- Registry ---

export interface BreakerRegistryOptions {
  clock?: () => number
  logger?: ConductorLogger
}

/** Model name → breaker. Breakers are created on first use and live as long as the registry. */
export class BreakerRegistry {
  private readonly breakers = new Map<string, CircuitBreaker>()
  private readonly clock: () => number
  private readonly logger: ConductorLogger

  constructor(
    private readonly config: CircuitBreakerConfig = DEFAULT_BREAKER_CONFIG,
    options: BreakerRegistryOptions = {},
  ) {
    this.clock = options.clock ?? Date.now
    this.logger = options.logger ?? console
  }

  get(model: string): CircuitBreaker {
    let breaker = this.breakers.get(model)
    if (!breaker) {
      breaker = new CircuitBreaker(model, this.config, this.clock)
      breaker.onTransition((name, from, to) => {
        if (to === "open") {
          this.logger.error(`[breaker] ${name}: ${from} -> ${to}`, { model: name, from, to })
        } else {
          this.logger.info(`[breaker] ${name}: ${from} -> ${to}`, { model: name, from, to })
        }
      })
      this.breakers.set(model, breaker)
    }
    return breaker
  }

  snapshot(): Record<string, CircuitBreakerStats> {
    const stats: Record<string, CircuitBreakerStats> = {}
    for (const [model, breaker] of this.breakers) {
      stats[model] = breaker.getStats()
    }
    return stats
  }
}
