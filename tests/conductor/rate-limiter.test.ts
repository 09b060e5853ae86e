// tests/conductor/rate-limiter.test.ts — Token bucket and provider rate limiter

import { describe, it, expect } from "vitest"
import * as fc from "fast-check"
import { ProviderRateLimiter, TokenBucket } from "../../src/conductor/rate-limiter.js"

describe("TokenBucket", () => {
  it("starts at full capacity", () => {
    const bucket = new TokenBucket(10, 1, () => 0)
    expect(bucket.remaining()).toBe(10)
  })

  it("tryConsume decrements tokens and fails when exhausted", () => {
    const bucket = new TokenBucket(2, 1, () => 0)
    expect(bucket.tryConsume()).toBe(true)
    expect(bucket.tryConsume()).toBe(true)
    expect(bucket.tryConsume()).toBe(false)
    expect(bucket.remaining()).toBe(0)
  })

  it("refills lazily from elapsed time, capped at capacity", () => {
    let now = 0
    const bucket = new TokenBucket(10, 1, () => now)
    for (let i = 0; i < 10; i++) bucket.tryConsume()

    now += 5000
    expect(bucket.remaining()).toBe(5)

    now += 60_000
    expect(bucket.remaining()).toBe(10)
  })

  it("fromRequestsPerMinute refills rpm/60 tokens per second", () => {
    let now = 0
    const bucket = TokenBucket.fromRequestsPerMinute(60, () => now)
    expect(bucket.capacity).toBe(60)
    expect(bucket.refillPerSecond).toBe(1)

    for (let i = 0; i < 60; i++) bucket.tryConsume()
    now += 1500
    expect(bucket.balance()).toBeCloseTo(1.5)
    expect(bucket.tryConsume()).toBe(true)
    expect(bucket.tryConsume()).toBe(false)
  })

  it("rejects non-positive configuration", () => {
    expect(() => new TokenBucket(0, 1)).toThrow(/Invalid token bucket config/)
    expect(() => new TokenBucket(1, 0)).toThrow(/Invalid token bucket config/)
  })

  it("rejects a capacity below one whole token", () => {
    expect(() => TokenBucket.fromRequestsPerMinute(0.5)).toThrow(/Invalid token bucket config: capacity=0\.5,/)
  })

  it("keeps the balance within [0, capacity] and consumes only when the balance covers it", () => {
    fc.assert(
      fc.property(
        fc.integer({ min: 1, max: 50 }),
        fc.array(
          fc.record({ advanceMs: fc.integer({ min: 0, max: 5000 }), amount: fc.integer({ min: 1, max: 10 }) }),
          { maxLength: 40 },
        ),
        (capacity, ops) => {
          let now = 0
          const bucket = new TokenBucket(capacity, 1, () => now)
          for (const op of ops) {
            now += op.advanceMs
            const before = bucket.balance()
            const consumed = bucket.tryConsume(op.amount)
            expect(consumed).toBe(before >= op.amount)
            const after = bucket.balance()
            expect(after).toBeGreaterThanOrEqual(0)
            expect(after).toBeLessThanOrEqual(capacity)
          }
        },
      ),
    )
  })
})

describe("ProviderRateLimiter", () => {
  it("admits providers without a configured limit immediately", async () => {
    const sleeps: number[] = []
    const limiter = new ProviderRateLimiter({}, { sleep: async (ms) => { sleeps.push(ms) } })
    await limiter.acquire("anything")
    await limiter.acquire("anything")
    expect(sleeps).toEqual([])
    expect(limiter.getStatus()).toEqual({})
  })

  it("polls on a fixed interval until the bucket refills", async () => {
    let now = 0
    const sleeps: number[] = []
    const limiter = new ProviderRateLimiter(
      { chat: { requests_per_minute: 600 } },
      {
        clock: () => now,
        sleep: async (ms) => {
          sleeps.push(ms)
          now += ms
        },
      },
    )

    for (let i = 0; i < 600; i++) await limiter.acquire("chat")
    expect(sleeps).toEqual([])

    // 600 rpm refills one token per 100ms poll
    await limiter.acquire("chat")
    expect(sleeps).toEqual([100])
    await limiter.acquire("chat")
    expect(sleeps).toEqual([100, 100])
  })

  it("reports capacity and remaining tokens per provider", async () => {
    const limiter = new ProviderRateLimiter(
      { chat: { requests_per_minute: 30 }, media: { requests_per_minute: 5 } },
      { clock: () => 0 },
    )
    await limiter.acquire("media")
    expect(limiter.getStatus()).toEqual({
      chat: { capacity: 30, remaining: 30 },
      media: { capacity: 5, remaining: 4 },
    })
  })
})
