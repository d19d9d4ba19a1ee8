/**
 * Teardown Waiter
 * Polls a session controller until the project's session is gone.
 */

import type { Logger } from "pino"
import type { SessionController } from "../ports/session-controller"
import { ShutdownTimeoutError } from "../errors"
import { constantIntervalPolicy, retryWithBackoff } from "../../lib/retry"

export interface TeardownWaitOptions {
  timeoutMs: number
  intervalMs: number
  signal?: AbortSignal
  logger?: Logger
}

class SessionStillRunningError extends Error {
  constructor(projectDir: string) {
    super(`session for ${projectDir} is still running`)
    this.name = "SessionStillRunningError"
  }
}

/**
 * Settle with `promise`, or reject with the signal's reason once it aborts.
 */
function abortable<T>(promise: Promise<T>, signal: AbortSignal): Promise<T> {
  if (signal.aborted) return Promise.reject(signal.reason)

  return new Promise<T>((resolve, reject) => {
    const onAbort = () => reject(signal.reason)
    signal.addEventListener("abort", onAbort, { once: true })
    promise.then(
      (value) => {
        signal.removeEventListener("abort", onAbort)
        resolve(value)
      },
      (error: unknown) => {
        signal.removeEventListener("abort", onAbort)
        reject(error)
      },
    )
  })
}

/**
 * Resolve once `getRunningSession` reports no session.
 * The whole wait, slow or hung status queries included, is capped at `timeoutMs`.
 * @throws ShutdownTimeoutError when the session outlives `timeoutMs`
 */
export async function waitForTeardown(
  controller: SessionController,
  projectDir: string,
  options: TeardownWaitOptions,
): Promise<void> {
  options.signal?.throwIfAborted()

  const deadline = AbortSignal.timeout(options.timeoutMs)
  const signal = options.signal ? AbortSignal.any([options.signal, deadline]) : deadline

  try {
    await retryWithBackoff(
      async () => {
        const session = await abortable(controller.getRunningSession(projectDir, { signal }), signal)
        if (session) {
          throw new SessionStillRunningError(projectDir)
        }
      },
      constantIntervalPolicy(options.intervalMs, options.timeoutMs),
      {
        signal,
        onFailedAttempt: (error) => {
          options.logger?.trace(
            { attempt: error.attemptNumber, retriesLeft: error.retriesLeft },
            "waiting for session teardown",
          )
        },
      },
    )
  } catch (error) {
    if (options.signal?.aborted) {
      throw options.signal.reason
    }
    throw new ShutdownTimeoutError(options.timeoutMs, { cause: error })
  }
}
