import { NodeAddress } from '../types/node-address';

/**
 * Observes raw traffic of a connection. Absent by default.
 */
export interface DebugListener {
  onWrite(address: NodeAddress, bytes: number): void;
  onReceive(address: NodeAddress, replies: number): void;
}
