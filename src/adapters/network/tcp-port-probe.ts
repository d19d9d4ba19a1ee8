/**
 * TCP Port Probe
 * Checks whether a host port is bound by briefly listening on it.
 */

import { createServer } from "node:net"
import type { PortProbe } from "../../core/ports/port-probe"

export interface TcpPortProbeOptions {
  /** Addresses to try; the port is in use when any of them is taken */
  hosts?: string[]
}

/** IPv4 and IPv6 wildcards, so listeners on `127.0.0.1` or `[::1]` alone are both seen */
export const DEFAULT_PROBE_HOSTS = ["0.0.0.0", "::"]

const IN_USE_CODES = new Set(["EADDRINUSE", "EACCES"])
// Address family not configured on this host
const UNAVAILABLE_CODES = new Set(["EAFNOSUPPORT", "EADDRNOTAVAIL"])

export class TcpPortProbe implements PortProbe {
  private readonly hosts: string[]

  constructor(options: TcpPortProbeOptions = {}) {
    this.hosts = options.hosts ?? DEFAULT_PROBE_HOSTS
  }

  async isInUse(port: number): Promise<boolean> {
    for (const host of this.hosts) {
      if (await this.isInUseOn(host, port)) return true
    }
    return false
  }

  private isInUseOn(host: string, port: number): Promise<boolean> {
    return new Promise((resolve, reject) => {
      const server = createServer()
      server.unref()

      server.once("error", (error: NodeJS.ErrnoException) => {
        if (error.code && IN_USE_CODES.has(error.code)) {
          resolve(true)
          return
        }
        if (error.code && UNAVAILABLE_CODES.has(error.code)) {
          resolve(false)
          return
        }
        reject(error)
      })

      server.listen({ port, host, exclusive: true }, () => {
        server.close((error) => {
          if (error) {
            reject(error)
            return
          }
          resolve(false)
        })
      })
    })
  }
}
