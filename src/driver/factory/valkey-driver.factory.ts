import { Injectable } from '@nestjs/common';
import {
  ConnectionDriver,
  ConnectionDriverFactory,
} from '../../common/interfaces/connection-driver.interface';
import { NodeAddress } from '../../common/types/node-address';
import { ConnectionConfig } from '../../config/client-config';
import { ValkeyDriver } from '../adapters/valkey.driver';

@Injectable()
export class ValkeyDriverFactory implements ConnectionDriverFactory {
  create(address: NodeAddress, config: ConnectionConfig): ConnectionDriver {
    return new ValkeyDriver({ address, connectTimeoutMs: config.connectTimeoutMs });
  }
}
