/**
 * Core Ports
 * Exports all port interfaces for dependency inversion.
 */

export type { RunningSession, SessionController, SessionQueryOptions } from "./session-controller"
export type { PortProbe } from "./port-probe"
export type { PortRecordRepository } from "./port-record-repository"
