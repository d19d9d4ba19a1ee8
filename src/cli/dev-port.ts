/**
 * dev-port CLI
 * Prints the port a project's development session should bind to.
 *
 *   PORT=$(npm run --silent dev-port)
 */

import type { Logger } from "pino"
import { ZodError } from "zod"
import { loadConfig, type AppConfig } from "../config"
import { createLogger } from "../logger"
import { createPortResolver } from "../index"
import type { PortResolver } from "../core/port-resolver"
import { FilePortRecordRepository } from "../adapters/persistence"
import { RecordCorruptError } from "../core/errors"

type Command = "resolve" | "show"

export interface CliIO {
  stdout: (text: string) => void
  stderr: (text: string) => void
}

export interface CliDependencies {
  loadConfig: () => AppConfig
  createResolver: (config: AppConfig, logger: Logger) => Pick<PortResolver, "resolvePort">
}

const defaultDependencies: CliDependencies = {
  loadConfig,
  createResolver: createPortResolver,
}

function parseCommand(argv: string[]): Command {
  const command = argv[0] ?? "resolve"
  if (command === "resolve" || command === "show") return command
  throw new Error(`unknown command: ${command} (expected resolve or show)`)
}

async function resolve(config: AppConfig, io: CliIO, deps: CliDependencies): Promise<void> {
  const logger = createLogger(config.logLevel)
  const resolver = deps.createResolver(config, logger)

  const abort = new AbortController()
  const onInterrupt = () => abort.abort(new Error("interrupted"))
  process.once("SIGINT", onInterrupt)

  try {
    const assignment = await resolver.resolvePort({
      workingDirectory: config.projectDir,
      basePort: config.basePort,
      maxAttempts: config.maxAttempts,
      signal: abort.signal,
    })
    io.stdout(`${assignment.port}\n`)
  } finally {
    process.off("SIGINT", onInterrupt)
  }
}

async function show(config: AppConfig, io: CliIO): Promise<void> {
  const records = new FilePortRecordRepository({ fileName: config.recordFile })
  try {
    const port = await records.read(config.projectDir)
    if (port !== null) io.stdout(`${port}\n`)
  } catch (error) {
    if (!(error instanceof RecordCorruptError)) throw error
  }
}

function describeError(error: unknown): string {
  if (error instanceof ZodError) {
    const issues = error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ")
    return `invalid configuration: ${issues}`
  }
  return error instanceof Error ? error.message : String(error)
}

/**
 * Run one CLI invocation.
 * @returns the process exit code
 */
export async function run(
  argv: string[],
  io: CliIO,
  deps: CliDependencies = defaultDependencies,
): Promise<number> {
  try {
    const command = parseCommand(argv)
    const config = deps.loadConfig()

    if (command === "show") {
      await show(config, io)
    } else {
      await resolve(config, io, deps)
    }
    return 0
  } catch (error) {
    io.stderr(`dev-port: ${describeError(error)}\n`)
    return 1
  }
}
