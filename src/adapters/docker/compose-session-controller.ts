/**
 * Compose Session Controller
 * Queries and stops a project's Docker Compose stack.
 */

import { execFile } from "node:child_process"
import { promisify } from "node:util"
import type { Logger } from "pino"
import type { RunningSession, SessionController, SessionQueryOptions } from "../../core/ports/session-controller"
import { errorMessage } from "../../core/errors"

export interface CommandResult {
  stdout: string
  stderr: string
}

export interface CommandOptions {
  cwd: string
  timeoutMs?: number
  signal?: AbortSignal
}

export type CommandRunner = (file: string, args: string[], options: CommandOptions) => Promise<CommandResult>

export interface ComposeSessionControllerOptions {
  service: string
  containerPort: number
  logger: Logger
  dockerBin?: string
  /** Kill status queries (`ps`, `port`) that run longer than this */
  queryTimeoutMs?: number
  run?: CommandRunner
}

export const DEFAULT_QUERY_TIMEOUT_MS = 10_000

const execFileAsync = promisify(execFile)

export const execCommand: CommandRunner = async (file, args, options) => {
  const { stdout, stderr } = await execFileAsync(file, args, {
    cwd: options.cwd,
    encoding: "utf8",
    timeout: options.timeoutMs ?? 0,
    signal: options.signal,
  })
  return { stdout, stderr }
}

/**
 * Extract the host port from `docker compose port` output such as
 * `0.0.0.0:3003` or `[::]:3003`.
 */
export function parsePublishedPort(output: string): number | null {
  for (const line of output.split("\n")) {
    const match = line.trim().match(/:(\d+)$/)
    if (!match) continue
    const port = Number.parseInt(match[1], 10)
    if (port >= 1 && port <= 65_535) return port
  }
  return null
}

export class ComposeSessionController implements SessionController {
  private readonly options: ComposeSessionControllerOptions
  private readonly run: CommandRunner
  private readonly dockerBin: string
  private readonly queryTimeoutMs: number

  constructor(options: ComposeSessionControllerOptions) {
    this.options = options
    this.run = options.run ?? execCommand
    this.dockerBin = options.dockerBin ?? "docker"
    this.queryTimeoutMs = options.queryTimeoutMs ?? DEFAULT_QUERY_TIMEOUT_MS
  }

  async getRunningSession(projectDir: string, options: SessionQueryOptions = {}): Promise<RunningSession | null> {
    const { stdout } = await this.query(
      projectDir,
      ["ps", "--status", "running", "--quiet", this.options.service],
      options.signal,
    )
    if (!stdout.trim()) return null

    return { port: await this.lookupPort(projectDir, options.signal) }
  }

  async stop(projectDir: string): Promise<void> {
    await this.compose(projectDir, ["down"])
    this.options.logger.info({ projectDir }, "compose stack stopped")
  }

  private async lookupPort(projectDir: string, signal: AbortSignal | undefined): Promise<number | null> {
    try {
      const { stdout } = await this.query(
        projectDir,
        ["port", this.options.service, String(this.options.containerPort)],
        signal,
      )
      return parsePublishedPort(stdout)
    } catch (error) {
      this.options.logger.debug({ error: errorMessage(error), projectDir }, "compose port lookup failed")
      return null
    }
  }

  private query(projectDir: string, args: string[], signal: AbortSignal | undefined): Promise<CommandResult> {
    const options: CommandOptions = { cwd: projectDir, timeoutMs: this.queryTimeoutMs }
    if (signal) options.signal = signal
    return this.run(this.dockerBin, ["compose", ...args], options)
  }

  private compose(projectDir: string, args: string[]): Promise<CommandResult> {
    return this.run(this.dockerBin, ["compose", ...args], { cwd: projectDir })
  }
}
