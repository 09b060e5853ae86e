// src/conductor/rate-limiter.ts — Per-provider token bucket rate limiter
// One bucket per upstream provider, sized from requests-per-minute. Refill is lazy.

// --- Token Bucket ---

export class TokenBucket {
  private tokens: number
  private lastRefillTime: number
  private readonly clock: () => number

  constructor(
    public readonly capacity: number,
    public readonly refillPerSecond: number,
    clock: () => number = Date.now,
  ) {
    // A bucket below one token can never admit a request
    if (capacity < 1 || refillPerSecond <= 0) {
      throw new Error(`Invalid token bucket config: capacity=${capacity}, refillPerSecond=${refillPerSecond}`)
    }
    this.tokens = capacity
    this.lastRefillTime = clock()
    this.clock = clock
  }

  /** Bucket sized for a requests-per-minute limit: capacity = rpm, rpm/60 tokens per second */
  static fromRequestsPerMinute(rpm: number, clock: () => number = Date.now): TokenBucket {
    return new TokenBucket(rpm, rpm / 60, clock)
  }

  tryConsume(amount: number = 1): boolean {
    this.refill()
    if (this.tokens < amount) return false
    this.tokens -= amount
    return true
  }

  /** Exact balance, including the fractional part */
  balance(): number {
    this.refill()
    return this.tokens
  }

  remaining(): number {
    return Math.floor(this.balance())
  }

  private refill(): void {
    const now = this.clock()
    const elapsedMs = now - this.lastRefillTime
    if (elapsedMs <= 0) return

    const tokensToAdd = (elapsedMs / 1000) * this.refillPerSecond
    this.tokens = Math.min(this.capacity, this.tokens + tokensToAdd)
    this.lastRefillTime = now
  }
}

// --- Provider Rate Limiter ---

export interface ProviderRateLimit {
  requests_per_minute: number
}

export interface ProviderRateLimiterOptions {
  clock?: () => number
  sleep?: (ms: number) => Promise<void>
  /** Fixed poll interval while waiting for a token (default: 100) */
  pollIntervalMs?: number
}

export interface RateLimitStatus {
  capacity: number
  remaining: number
}

export class ProviderRateLimiter {
  private readonly buckets = new Map<string, TokenBucket>()
  private readonly sleep: (ms: number) => Promise<void>
  private readonly pollIntervalMs: number

  constructor(
    limits: Record<string, ProviderRateLimit> = {},
    options: ProviderRateLimiterOptions = {},
  ) {
    const clock = options.clock ?? Date.now
    for (const [provider, limit] of Object.entries(limits)) {
      this.buckets.set(provider, TokenBucket.fromRequestsPerMinute(limit.requests_per_minute, clock))
    }
    this.sleep = options.sleep ?? ((ms) => new Promise(resolve => setTimeout(resolve, ms)))
    this.pollIntervalMs = options.pollIntervalMs ?? 100
  }

  /**
   * Wait until the provider's bucket admits one request.
   * Providers without a configured limit are admitted immediately.
   * Consumed tokens are not refunded if the caller abandons the request.
   */
  async acquire(provider: string): Promise<void> {
    const bucket = this.buckets.get(provider)
    if (!bucket) return
    while (!bucket.tryConsume(1)) {
      await this.sleep(this.pollIntervalMs)
    }
  }

  getStatus(): Record<string, RateLimitStatus> {
    const status: Record<string, RateLimitStatus> = {}
    for (const [provider, bucket] of this.buckets) {
      status[provider] = { capacity: bucket.capacity, remaining: bucket.remaining() }
    }
    return status
  }
}
