/**
 * Port Probe Port
 * Defines the contract for checking whether a host port is bound.
 */

export interface PortProbe {
  isInUse(port: number): Promise<boolean>
}
