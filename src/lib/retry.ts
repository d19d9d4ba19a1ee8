import pRetry, { type FailedAttemptError } from "p-retry"

export interface RetryPolicy {
  retries: number
  minTimeoutMs: number
  maxTimeoutMs: number
  factor?: number
  /** Stop retrying once this much time has passed since the first attempt */
  maxRetryTimeMs?: number
}

export interface RetryHooks {
  onFailedAttempt?: (error: FailedAttemptError) => void
  signal?: AbortSignal
}

export interface BuiltRetryOptions {
  retries: number
  minTimeout: number
  maxTimeout: number
  factor: number
  randomize: boolean
  maxRetryTime?: number
  onFailedAttempt?: (error: FailedAttemptError) => void
  signal?: AbortSignal
}

export async function retryWithBackoff<T>(
  operation: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {},
): Promise<T> {
  return pRetry(operation, buildRetryOptions(policy, hooks))
}

export function buildRetryOptions(policy: RetryPolicy, hooks: RetryHooks = {}): BuiltRetryOptions {
  const options: BuiltRetryOptions = {
    retries: policy.retries,
    minTimeout: policy.minTimeoutMs,
    maxTimeout: policy.maxTimeoutMs,
    factor: policy.factor ?? 2,
    randomize: false,
  }
  if (policy.maxRetryTimeMs !== undefined) options.maxRetryTime = policy.maxRetryTimeMs
  // p-retry spreads these over its own defaults, so an explicit undefined would clobber them
  if (hooks.onFailedAttempt) options.onFailedAttempt = hooks.onFailedAttempt
  if (hooks.signal) options.signal = hooks.signal

  return options
}

/**
 * Fixed-interval polling policy bounded by a total wait.
 */
export function constantIntervalPolicy(intervalMs: number, timeoutMs: number): RetryPolicy {
  const interval = Math.max(1, intervalMs)
  return {
    retries: Math.max(0, Math.ceil(timeoutMs / interval)),
    minTimeoutMs: interval,
    maxTimeoutMs: interval,
    factor: 1,
    maxRetryTimeMs: timeoutMs,
  }
}
