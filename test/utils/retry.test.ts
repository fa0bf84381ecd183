import { describe, expect, it } from "vitest"

import { computeBackoffMs, retry, type RetryContext } from "../../src/utils/retry.js"
import { FakeClock } from "../helpers/fake-clock.js"

const noJitter = { randomFn: () => 0 }

describe("computeBackoffMs", () => {
  it("doubles from the minimum and caps at the maximum", () => {
    const opts = { minDelayMs: 100, maxDelayMs: 1000, ...noJitter }
    expect(computeBackoffMs(0, opts)).toBe(100)
    expect(computeBackoffMs(2, opts)).toBe(400)
    expect(computeBackoffMs(5, opts)).toBe(1000)
  })

  it("prefers a server-provided delay, still capped", () => {
    const opts = { minDelayMs: 100, maxDelayMs: 1000, ...noJitter }
    expect(computeBackoffMs(0, opts, 700)).toBe(700)
    expect(computeBackoffMs(0, opts, 5000)).toBe(1000)
  })

  it("adds jitter proportional to the backoff", () => {
    expect(computeBackoffMs(0, { minDelayMs: 100, maxDelayMs: 1000, randomFn: () => 1, jitterRatio: 0.5 })).toBe(150)
  })
})

describe("retry", () => {
  it("retries until the call succeeds", async () => {
    const clock = new FakeClock()
    const seen: RetryContext[] = []
    let calls = 0

    const result = await retry(
      () => {
        calls += 1
        return calls < 3 ? Promise.reject(new Error(`fail ${calls}`)) : Promise.resolve("ok")
      },
      {
        retries: 4,
        minDelayMs: 100,
        maxDelayMs: 1000,
        shouldRetry: () => true,
        onRetry: (ctx) => seen.push(ctx),
        clock,
        ...noJitter,
      },
    )

    expect(result).toBe("ok")
    expect(calls).toBe(3)
    expect(clock.sleeps).toEqual([100, 200])
    expect(seen.map((ctx) => ctx.attempt)).toEqual([1, 2])
    expect(seen[0].maxAttempts).toBe(5)
  })

  it("gives up after the last retry with the last error", async () => {
    const clock = new FakeClock()
    let calls = 0
    await expect(
      retry(
        () => {
          calls += 1
          return Promise.reject(new Error(`fail ${calls}`))
        },
        { retries: 2, minDelayMs: 10, maxDelayMs: 10, shouldRetry: () => true, clock, ...noJitter },
      ),
    ).rejects.toThrow("fail 3")
    expect(calls).toBe(3)
  })

  it("does not retry when the error is not retryable", async () => {
    const clock = new FakeClock()
    let calls = 0
    await expect(
      retry(
        () => {
          calls += 1
          return Promise.reject(new Error("bad request"))
        },
        { retries: 5, minDelayMs: 10, maxDelayMs: 10, shouldRetry: () => false, clock },
      ),
    ).rejects.toThrow("bad request")
    expect(calls).toBe(1)
    expect(clock.sleeps).toEqual([])
  })

  it("never waits past the delay budget and stops when it is spent", async () => {
    const clock = new FakeClock()
    const budgets = [150, 0]
    let calls = 0
    await expect(
      retry(
        () => {
          calls += 1
          return Promise.reject(new Error("down"))
        },
        {
          retries: 5,
          minDelayMs: 1000,
          maxDelayMs: 5000,
          shouldRetry: () => true,
          delayBudgetMs: () => budgets.shift() ?? 0,
          clock,
          ...noJitter,
        },
      ),
    ).rejects.toThrow("down")
    expect(clock.sleeps).toEqual([150])
    expect(calls).toBe(2)
  })
})
