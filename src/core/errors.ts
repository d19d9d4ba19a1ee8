/**
 * Port Reservation Errors
 * Typed failures raised while resolving a session port.
 */

import { MAX_PORT } from "./constants"

export const PORT_RESERVATION_ERROR_CODES = Object.freeze({
  PORT_EXHAUSTED: "PORT_EXHAUSTED",
  SHUTDOWN_TIMEOUT: "SHUTDOWN_TIMEOUT",
  RECORD_CORRUPT: "RECORD_CORRUPT",
} as const)

export type PortReservationErrorCode =
  (typeof PORT_RESERVATION_ERROR_CODES)[keyof typeof PORT_RESERVATION_ERROR_CODES]

export class PortReservationError extends Error {
  readonly code: PortReservationErrorCode

  constructor(message: string, code: PortReservationErrorCode, options?: { cause?: unknown }) {
    super(message, options)
    this.name = "PortReservationError"
    this.code = code
  }
}

/**
 * No free port in `[basePort, basePort + maxAttempts)`.
 */
export class PortExhaustedError extends PortReservationError {
  readonly basePort: number
  readonly maxAttempts: number

  constructor(basePort: number, maxAttempts: number) {
    super(
      `no free port found in ${basePort}-${Math.min(basePort + maxAttempts - 1, MAX_PORT)} (${maxAttempts} attempts)`,
      PORT_RESERVATION_ERROR_CODES.PORT_EXHAUSTED,
    )
    this.name = "PortExhaustedError"
    this.basePort = basePort
    this.maxAttempts = maxAttempts
  }
}

/**
 * The running session did not finish tearing down within the wait bound.
 */
export class ShutdownTimeoutError extends PortReservationError {
  readonly timeoutMs: number

  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(
      `session still running after ${timeoutMs}ms`,
      PORT_RESERVATION_ERROR_CODES.SHUTDOWN_TIMEOUT,
      options,
    )
    this.name = "ShutdownTimeoutError"
    this.timeoutMs = timeoutMs
  }
}

export class RecordCorruptError extends PortReservationError {
  readonly recordPath: string

  constructor(recordPath: string, detail: string, options?: { cause?: unknown }) {
    super(
      `port record ${recordPath} is unusable: ${detail}`,
      PORT_RESERVATION_ERROR_CODES.RECORD_CORRUPT,
      options,
    )
    this.name = "RecordCorruptError"
    this.recordPath = recordPath
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}
