import { Logger } from '@nestjs/common';
import { DebugListener } from '../common/interfaces/debug-listener.interface';
import { NodeAddress, formatNodeAddress } from '../common/types/node-address';

export class LoggingDebugListener implements DebugListener {
  private readonly logger = new Logger(LoggingDebugListener.name);

  onWrite(address: NodeAddress, bytes: number): void {
    this.logger.verbose(`${formatNodeAddress(address)} <- ${bytes} bytes`);
  }

  onReceive(address: NodeAddress, replies: number): void {
    this.logger.verbose(`${formatNodeAddress(address)} -> ${replies} replies`);
  }
}
