import { ConnectionConfig } from '../../config/client-config';
import { NodeAddress } from '../types/node-address';
import { RawCommand } from '../../protocol/raw-command';
import { RawReply } from '../../protocol/reply';

/**
 * One physical connection to one node. It never reconnects by itself; the
 * connection unit that owns it decides what happens after a loss.
 */
export interface ConnectionDriver {
  connect(): Promise<void>;
  /**
   * Writes all commands in one go and resolves with one reply per command,
   * in order. Rejects only on transport failure; error replies come back as
   * `ErrorReply` values.
   */
  execute(commands: readonly RawCommand[]): Promise<RawReply[]>;
  /** Called once when the connection goes away, whatever the reason. */
  onClose(listener: (cause: Error) => void): void;
  disconnect(): Promise<void>;
}

export interface ConnectionDriverFactory {
  create(address: NodeAddress, config: ConnectionConfig): ConnectionDriver;
}

export const CONNECTION_DRIVER_FACTORY = 'CONNECTION_DRIVER_FACTORY';
