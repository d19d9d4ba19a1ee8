import pino, { type Logger } from "pino"

/**
 * Logs go to stderr; stdout carries only the resolved port.
 */
export function createLogger(level: string): Logger {
  return pino({ name: "stickyport", level }, pino.destination(2))
}
