import { afterEach, beforeEach, describe, expect, test } from "vitest"
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises"
import { createServer, type Server } from "node:net"
import { tmpdir } from "node:os"
import { join } from "node:path"
import pino from "pino"
import { PortResolver } from "../../src/core/port-resolver"
import { FilePortRecordRepository } from "../../src/adapters/persistence"
import { TcpPortProbe } from "../../src/adapters/network"
import type { SessionController } from "../../src/core/ports"

const noSession: SessionController = {
  getRunningSession: async () => null,
  stop: async () => {},
}

function listen(server: Server): Promise<number> {
  return new Promise((resolve, reject) => {
    server.once("error", reject)
    server.listen(0, "127.0.0.1", () => {
      const address = server.address()
      if (!address || typeof address === "string") {
        reject(new Error("server has no TCP address"))
        return
      }
      resolve(address.port)
    })
  })
}

describe("resolvePort against the local host", () => {
  let projectDir: string
  let server: Server
  let resolver: PortResolver

  beforeEach(async () => {
    projectDir = await mkdtemp(join(tmpdir(), "stickyport-it-"))
    server = createServer()
    resolver = new PortResolver({
      sessions: noSession,
      probe: new TcpPortProbe({ hosts: ["127.0.0.1"] }),
      records: new FilePortRecordRepository(),
      logger: pino({ enabled: false }),
    })
  })

  afterEach(async () => {
    await new Promise<void>((resolve) => (server.listening ? server.close(() => resolve()) : resolve()))
    await rm(projectDir, { recursive: true, force: true })
  })

  test("skips an occupied base port and records the chosen one", async () => {
    const occupied = await listen(server)

    const assignment = await resolver.resolvePort({
      workingDirectory: projectDir,
      basePort: occupied,
      maxAttempts: 10,
    })

    expect(assignment.tier).toBe("scan")
    expect(assignment.port).toBeGreaterThan(occupied)
    expect(assignment.port).toBeLessThan(occupied + 10)
    expect(await readFile(join(projectDir, ".dev-port"), "utf8")).toBe(`${assignment.port}\n`)
  })

  test("drops a sticky port once another process holds it", async () => {
    const occupied = await listen(server)
    await writeFile(join(projectDir, ".dev-port"), `${occupied}\n`)

    const assignment = await resolver.resolvePort({
      workingDirectory: projectDir,
      basePort: occupied,
      maxAttempts: 10,
    })

    expect(assignment.tier).toBe("scan")
    expect(assignment.port).not.toBe(occupied)
  })
})
