import { afterEach, beforeEach, describe, expect, test, vi } from "vitest"
import { mkdtemp, rm, writeFile } from "node:fs/promises"
import { tmpdir } from "node:os"
import { join } from "node:path"
import { z } from "zod"
import { run, type CliDependencies } from "../../src/cli/dev-port"
import type { AppConfig } from "../../src/config"
import { PortExhaustedError } from "../../src/core/errors"
import type { PortAssignment, ResolveContext } from "../../src/core/port-resolver"

function createIO() {
  const out: string[] = []
  const err: string[] = []
  return {
    io: { stdout: (text: string) => out.push(text), stderr: (text: string) => err.push(text) },
    out,
    err,
  }
}

describe("dev-port", () => {
  let projectDir: string
  let config: AppConfig

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "stickyport-cli-"))
    config = {
      logLevel: "silent",
      projectDir,
      basePort: 8000,
      maxAttempts: 5,
      recordFile: ".dev-port",
      probeHosts: ["127.0.0.1"],
      composeService: "app",
      containerPort: 3000,
      shutdownTimeoutMs: 1000,
      shutdownPollIntervalMs: 10,
      dockerQueryTimeoutMs: 1000,
    }
  })

  afterEach(async () => {
    await rm(projectDir, { recursive: true, force: true })
  })

  function deps(resolvePort: (context: ResolveContext) => Promise<PortAssignment>): CliDependencies {
    return {
      loadConfig: () => config,
      createResolver: () => ({ resolvePort }),
    }
  }

  test("resolve prints the port alone on stdout", async () => {
    const resolvePort = vi.fn(async (_context: ResolveContext): Promise<PortAssignment> => ({
      port: 8003,
      tier: "scan",
      persisted: true,
    }))
    const { io, out, err } = createIO()

    const code = await run(["resolve"], io, deps(resolvePort))

    expect(code).toBe(0)
    expect(out).toEqual(["8003\n"])
    expect(err).toEqual([])
    expect(resolvePort).toHaveBeenCalledWith({
      workingDirectory: projectDir,
      basePort: 8000,
      maxAttempts: 5,
      signal: expect.any(AbortSignal),
    })
  })

  test("resolves when no command is given", async () => {
    const { io, out } = createIO()

    const code = await run([], io, deps(async () => ({ port: 8001, tier: "sticky", persisted: true })))

    expect(code).toBe(0)
    expect(out).toEqual(["8001\n"])
  })

  test("exits 1 with one line when no port is free", async () => {
    const { io, out, err } = createIO()

    const code = await run(
      ["resolve"],
      io,
      deps(async () => {
        throw new PortExhaustedError(8000, 5)
      }),
    )

    expect(code).toBe(1)
    expect(out).toEqual([])
    expect(err).toEqual(["dev-port: no free port found in 8000-8004 (5 attempts)\n"])
  })

  test("exits 1 with one line on invalid configuration", async () => {
    const { io, err } = createIO()
    const invalid: CliDependencies = {
      loadConfig: () => {
        z.object({ basePort: z.number() }).parse({ basePort: "abc" })
        return config
      },
      createResolver: () => ({ resolvePort: vi.fn() }),
    }

    const code = await run(["resolve"], io, invalid)

    expect(code).toBe(1)
    expect(err).toEqual(["dev-port: invalid configuration: basePort: Expected number, received string\n"])
  })

  test("rejects an unknown command", async () => {
    const { io, out, err } = createIO()
    const loadConfig = vi.fn(() => config)

    const code = await run(["frob"], io, { loadConfig, createResolver: () => ({ resolvePort: vi.fn() }) })

    expect(code).toBe(1)
    expect(out).toEqual([])
    expect(err).toEqual(["dev-port: unknown command: frob (expected resolve or show)\n"])
    expect(loadConfig).not.toHaveBeenCalled()
  })

  test("show prints the recorded port", async () => {
    await writeFile(join(projectDir, ".dev-port"), "4010\n")
    const { io, out } = createIO()

    const code = await run(["show"], io, deps(vi.fn()))

    expect(code).toBe(0)
    expect(out).toEqual(["4010\n"])
  })

  test("show prints nothing without a record", async () => {
    const { io, out, err } = createIO()

    const code = await run(["show"], io, deps(vi.fn()))

    expect(code).toBe(0)
    expect(out).toEqual([])
    expect(err).toEqual([])
  })

  test("show prints nothing for a corrupt record", async () => {
    await writeFile(join(projectDir, ".dev-port"), "not-a-port\n")
    const { io, out, err } = createIO()

    const code = await run(["show"], io, deps(vi.fn()))

    expect(code).toBe(0)
    expect(out).toEqual([])
    expect(err).toEqual([])
  })
})
