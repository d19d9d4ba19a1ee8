/**
 * File Port Record Repository Implementation
 * Implements PortRecordRepository as a plain-integer dot-file in the project directory.
 */

import { readFile, rename, rm, writeFile } from "node:fs/promises"
import { join } from "node:path"
import type { PortRecordRepository } from "../../../core/ports/port-record-repository"
import { RecordCorruptError, errorMessage } from "../../../core/errors"
import { MAX_PORT } from "../../../core/constants"

export const DEFAULT_RECORD_FILE = ".dev-port"

export interface FilePortRecordRepositoryOptions {
  fileName?: string
}

export class FilePortRecordRepository implements PortRecordRepository {
  private readonly fileName: string

  constructor(options: FilePortRecordRepositoryOptions = {}) {
    this.fileName = options.fileName ?? DEFAULT_RECORD_FILE
  }

  recordPath(projectDir: string): string {
    return join(projectDir, this.fileName)
  }

  async read(projectDir: string): Promise<number | null> {
    const path = this.recordPath(projectDir)

    let raw: string
    try {
      raw = await readFile(path, "utf8")
    } catch (error) {
      if (isErrnoException(error) && error.code === "ENOENT") return null
      throw new RecordCorruptError(path, `unreadable (${errorMessage(error)})`, { cause: error })
    }

    const value = raw.trim()
    if (!/^\d+$/.test(value)) {
      throw new RecordCorruptError(path, `not a port number: ${JSON.stringify(value.slice(0, 32))}`)
    }

    const port = Number.parseInt(value, 10)
    if (port < 1 || port > MAX_PORT) {
      throw new RecordCorruptError(path, `port ${port} out of range`)
    }
    return port
  }

  async write(projectDir: string, port: number): Promise<void> {
    const path = this.recordPath(projectDir)
    const tmpPath = `${path}.${process.pid}.tmp`
    try {
      await writeFile(tmpPath, `${port}\n`, "utf8")
      await rename(tmpPath, path)
    } catch (error) {
      await rm(tmpPath, { force: true })
      throw error
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && "code" in error
}
