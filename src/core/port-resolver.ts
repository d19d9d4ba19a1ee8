/**
 * Port Resolver
 * Picks the port a project's development session binds to: reclaim the
 * running session's port, reuse the sticky record, or scan from the base.
 */

import type { Logger } from "pino"
import { z } from "zod"
import type { PortProbe, PortRecordRepository, RunningSession, SessionController } from "./ports"
import { PortExhaustedError, RecordCorruptError, ShutdownTimeoutError, errorMessage } from "./errors"
import { waitForTeardown } from "./services/teardown-waiter"
import { MAX_PORT } from "./constants"

export type ResolutionTier = "reclaim" | "sticky" | "scan"

export type ResolutionState =
  | "START"
  | "CHECK_RUNNING"
  | "FOUND_RUNNING"
  | "STOP"
  | "WAIT_TEARDOWN"
  | "NOT_RUNNING"
  | "CHECK_STICKY"
  | "SCAN"
  | "REUSE"
  | "PERSIST"
  | "DONE"
  | "FAILED"

export interface PortAssignment {
  port: number
  tier: ResolutionTier
  /** False when the record could not be written; the port is still usable */
  persisted: boolean
}

export interface ResolveContext {
  workingDirectory: string
  basePort?: number
  maxAttempts?: number
  signal?: AbortSignal
}

export interface PortResolverOptions {
  sessions: SessionController
  probe: PortProbe
  records: PortRecordRepository
  logger: Logger
  shutdownTimeoutMs?: number
  shutdownPollIntervalMs?: number
  onTransition?: (state: ResolutionState) => void
}

const DEFAULTS = {
  basePort: 3000,
  maxAttempts: 20,
  shutdownTimeoutMs: 30_000,
  shutdownPollIntervalMs: 100,
} as const

const ResolveContextSchema = z.object({
  workingDirectory: z.string().min(1),
  basePort: z.number().int().min(1).max(MAX_PORT),
  maxAttempts: z.number().int().positive(),
})

export class PortResolver {
  private readonly options: PortResolverOptions

  constructor(options: PortResolverOptions) {
    this.options = options
  }

  /**
   * Resolve and persist the port for a project.
   * @throws PortExhaustedError when the scan finds nothing free
   */
  async resolvePort(context: ResolveContext): Promise<PortAssignment> {
    const { workingDirectory, basePort, maxAttempts } = ResolveContextSchema.parse({
      workingDirectory: context.workingDirectory,
      basePort: context.basePort ?? DEFAULTS.basePort,
      maxAttempts: context.maxAttempts ?? DEFAULTS.maxAttempts,
    })
    const signal = context.signal

    this.enter("START")
    try {
      const resolved =
        (await this.reclaimRunningSession(workingDirectory, signal)) ??
        (await this.reuseStickyRecord(workingDirectory)) ??
        (await this.scan(basePort, maxAttempts))

      this.enter("REUSE")
      signal?.throwIfAborted()
      this.enter("PERSIST")
      const persisted = await this.persist(workingDirectory, resolved.port)
      this.enter("DONE")

      this.options.logger.info({ port: resolved.port, tier: resolved.tier, workingDirectory }, "port resolved")
      return { ...resolved, persisted }
    } catch (error) {
      this.enter("FAILED")
      throw error
    }
  }

  private async reclaimRunningSession(
    projectDir: string,
    signal: AbortSignal | undefined,
  ): Promise<Omit<PortAssignment, "persisted"> | null> {
    const { sessions, logger } = this.options

    this.enter("CHECK_RUNNING")
    let running: RunningSession | null
    try {
      running = await sessions.getRunningSession(projectDir)
    } catch (error) {
      logger.warn({ error: errorMessage(error), projectDir }, "session status query failed, assuming none running")
      running = null
    }

    if (!running) {
      this.enter("NOT_RUNNING")
      return null
    }

    this.enter("FOUND_RUNNING")
    logger.info({ port: running.port, projectDir }, "stopping running session to reclaim its port")

    signal?.throwIfAborted()
    this.enter("STOP")
    try {
      await sessions.stop(projectDir)
    } catch (error) {
      logger.warn({ error: errorMessage(error), projectDir }, "failed to stop running session")
      this.enter("NOT_RUNNING")
      return null
    }

    this.enter("WAIT_TEARDOWN")
    try {
      await waitForTeardown(sessions, projectDir, {
        timeoutMs: this.options.shutdownTimeoutMs ?? DEFAULTS.shutdownTimeoutMs,
        intervalMs: this.options.shutdownPollIntervalMs ?? DEFAULTS.shutdownPollIntervalMs,
        signal,
        logger,
      })
    } catch (error) {
      if (!(error instanceof ShutdownTimeoutError)) throw error
      logger.warn({ timeoutMs: error.timeoutMs, projectDir }, "session teardown timed out, falling back")
      this.enter("NOT_RUNNING")
      return null
    }

    if (running.port === null) {
      logger.warn({ projectDir }, "stopped session published no port, falling back")
      this.enter("NOT_RUNNING")
      return null
    }

    return { port: running.port, tier: "reclaim" }
  }

  private async reuseStickyRecord(projectDir: string): Promise<Omit<PortAssignment, "persisted"> | null> {
    const { records, probe, logger } = this.options

    this.enter("CHECK_STICKY")
    let recorded: number | null
    try {
      recorded = await records.read(projectDir)
    } catch (error) {
      if (!(error instanceof RecordCorruptError)) throw error
      logger.warn({ recordPath: error.recordPath }, "ignoring corrupt port record")
      return null
    }

    if (recorded === null) return null

    if (await probe.isInUse(recorded)) {
      logger.info({ port: recorded }, "sticky port is taken by another process")
      return null
    }

    return { port: recorded, tier: "sticky" }
  }

  private async scan(basePort: number, maxAttempts: number): Promise<Omit<PortAssignment, "persisted">> {
    this.enter("SCAN")
    const lastPort = Math.min(basePort + maxAttempts - 1, MAX_PORT)

    for (let port = basePort; port <= lastPort; port++) {
      if (!(await this.options.probe.isInUse(port))) {
        return { port, tier: "scan" }
      }
      this.options.logger.debug({ port }, "port in use")
    }

    throw new PortExhaustedError(basePort, maxAttempts)
  }

  private async persist(projectDir: string, port: number): Promise<boolean> {
    try {
      await this.options.records.write(projectDir, port)
      return true
    } catch (error) {
      this.options.logger.warn({ error: errorMessage(error), port, projectDir }, "failed to persist port record")
      return false
    }
  }

  private enter(state: ResolutionState): void {
    this.options.logger.debug({ state }, "port resolution state")
    this.options.onTransition?.(state)
  }
}
