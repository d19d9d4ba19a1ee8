/**
 * stickyport
 * Sticky per-project port reservation for development sessions.
 */

import type { Logger } from "pino"
import type { AppConfig } from "./config"
import { PortResolver } from "./core/port-resolver"
import { ComposeSessionController } from "./adapters/docker"
import { TcpPortProbe } from "./adapters/network"
import { FilePortRecordRepository } from "./adapters/persistence"

export {
  PortResolver,
  type PortAssignment,
  type PortResolverOptions,
  type ResolutionState,
  type ResolutionTier,
  type ResolveContext,
} from "./core/port-resolver"
export { MAX_PORT } from "./core/constants"
export {
  PortReservationError,
  PortExhaustedError,
  ShutdownTimeoutError,
  RecordCorruptError,
  PORT_RESERVATION_ERROR_CODES,
  type PortReservationErrorCode,
} from "./core/errors"
export type {
  PortProbe,
  PortRecordRepository,
  RunningSession,
  SessionController,
  SessionQueryOptions,
} from "./core/ports"
export { waitForTeardown, type TeardownWaitOptions } from "./core/services/teardown-waiter"
export { ComposeSessionController, parsePublishedPort, type CommandRunner } from "./adapters/docker"
export { TcpPortProbe } from "./adapters/network"
export { FilePortRecordRepository, DEFAULT_RECORD_FILE } from "./adapters/persistence"
export { loadConfig, type AppConfig } from "./config"
export { createLogger } from "./logger"

/**
 * Wire the host adapters into a resolver.
 */
export function createPortResolver(config: AppConfig, logger: Logger): PortResolver {
  return new PortResolver({
    sessions: new ComposeSessionController({
      service: config.composeService,
      containerPort: config.containerPort,
      queryTimeoutMs: config.dockerQueryTimeoutMs,
      logger: logger.child({ component: "compose" }),
    }),
    probe: new TcpPortProbe({ hosts: config.probeHosts }),
    records: new FilePortRecordRepository({ fileName: config.recordFile }),
    logger,
    shutdownTimeoutMs: config.shutdownTimeoutMs,
    shutdownPollIntervalMs: config.shutdownPollIntervalMs,
  })
}
