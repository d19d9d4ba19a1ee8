import { describe, test, expect } from "vitest"
import { retryWithBackoff, buildRetryOptions, constantIntervalPolicy } from "../../src/lib/retry"

describe("retryWithBackoff", () => {
  test("retries until operation succeeds", async () => {
    let attempts = 0

    const result = await retryWithBackoff(
      async () => {
        attempts += 1
        if (attempts < 3) {
          throw new Error("transient failure")
        }
        return "ok"
      },
      {
        retries: 3,
        minTimeoutMs: 1,
        maxTimeoutMs: 10,
      },
    )

    expect(result).toBe("ok")
    expect(attempts).toBe(3)
  })

  test("throws when retries are exhausted", async () => {
    let attempts = 0

    await expect(
      retryWithBackoff(
        async () => {
          attempts += 1
          throw new Error("still failing")
        },
        {
          retries: 2,
          minTimeoutMs: 1,
          maxTimeoutMs: 10,
        },
      ),
    ).rejects.toThrow("still failing")

    expect(attempts).toBe(3)
  })

  test("reports each failed attempt", async () => {
    const seen: Array<[number, number]> = []

    await expect(
      retryWithBackoff(
        async () => {
          throw new Error("nope")
        },
        { retries: 2, minTimeoutMs: 1, maxTimeoutMs: 1 },
        { onFailedAttempt: (error) => seen.push([error.attemptNumber, error.retriesLeft]) },
      ),
    ).rejects.toThrow("nope")

    expect(seen).toEqual([
      [1, 2],
      [2, 1],
      [3, 0],
    ])
  })

  test("builds retry options with deterministic backoff defaults", () => {
    const options = buildRetryOptions({
      retries: 3,
      minTimeoutMs: 100,
      maxTimeoutMs: 1000,
    })

    expect(options.retries).toBe(3)
    expect(options.minTimeout).toBe(100)
    expect(options.maxTimeout).toBe(1000)
    expect(options.factor).toBe(2)
    expect(options.randomize).toBe(false)
    expect(options.signal).toBeUndefined()
    expect(options).not.toHaveProperty("maxRetryTime")
    expect(options).not.toHaveProperty("onFailedAttempt")
  })

  test("passes a total retry time through to p-retry", () => {
    const options = buildRetryOptions({ retries: 3, minTimeoutMs: 10, maxTimeoutMs: 10, maxRetryTimeMs: 250 })

    expect(options.maxRetryTime).toBe(250)
  })
})

describe("constantIntervalPolicy", () => {
  test("spreads the wait over fixed intervals", () => {
    expect(constantIntervalPolicy(100, 30_000)).toEqual({
      retries: 300,
      minTimeoutMs: 100,
      maxTimeoutMs: 100,
      factor: 1,
      maxRetryTimeMs: 30_000,
    })
  })

  test("rounds a partial interval up", () => {
    expect(constantIntervalPolicy(100, 250).retries).toBe(3)
  })

  test("clamps the interval to at least 1ms", () => {
    expect(constantIntervalPolicy(0, 5)).toEqual({
      retries: 5,
      minTimeoutMs: 1,
      maxTimeoutMs: 1,
      factor: 1,
      maxRetryTimeMs: 5,
    })
  })
})
