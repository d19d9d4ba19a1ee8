/**
 * Session Controller Port
 * Defines the contract for querying and stopping a project's running
 * development session.
 */

export interface RunningSession {
  /** Host port the session currently publishes, when it can be determined */
  port: number | null
}

export interface SessionQueryOptions {
  /** Aborted when the caller stops waiting for the answer */
  signal?: AbortSignal
}

export interface SessionController {
  /**
   * Report the active session for a project, or null when none is running
   */
  getRunningSession(projectDir: string, options?: SessionQueryOptions): Promise<RunningSession | null>

  /**
   * Stop the project's session. Stopping an already stopped session is a no-op.
   */
  stop(projectDir: string): Promise<void>
}
