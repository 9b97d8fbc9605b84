import { Logger } from '@nestjs/common';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../common/constants/cluster.constants';
import { ClientStoppedError } from '../common/errors/redis.errors';
import { ConnectionDriverFactory } from '../common/interfaces/connection-driver.interface';
import { RedisExecutor } from '../common/interfaces/redis-executor.interface';
import { DEFAULT_NODE_ADDRESS, NodeAddress, formatNodeAddress } from '../common/types/node-address';
import { withTimeout } from '../common/utils/timeout';
import { NodeConfig, nodeConfig } from '../config/client-config';
import { ConnectionUnit } from '../connection/connection-unit';
import { ValkeyDriverFactory } from '../driver/factory/valkey-driver.factory';
import { executeOperation } from '../operation/operation-interpreter';
import { Batch } from '../protocol/batch';
import { RedisOp } from '../protocol/operation';
import { Level } from '../protocol/raw-command';

/**
 * Client of a single node backed by a pool of connection units, used in
 * turn. Commands changing connection state are rejected, since consecutive
 * batches may land on different connections.
 */
export class RedisNodeClient implements RedisExecutor {
  private readonly logger = new Logger(RedisNodeClient.name);
  private readonly units: ConnectionUnit[];
  private nextUnit = 0;
  private closing: Promise<void> | null = null;

  readonly initialized: Promise<this>;

  constructor(
    readonly address: NodeAddress = DEFAULT_NODE_ADDRESS,
    config: NodeConfig = nodeConfig(),
    driverFactory: ConnectionDriverFactory = new ValkeyDriverFactory(),
  ) {
    if (config.poolSize < 1) {
      throw new Error(`Pool size must be at least 1, got ${config.poolSize}`);
    }

    this.units = Array.from(
      { length: config.poolSize },
      (_, index) =>
        new ConnectionUnit({
          address,
          config: config.connectionConfigs(index),
          driverFactory,
          level: Level.Node,
          clientName: RedisNodeClient.name,
        }),
    );

    this.initialized = Promise.all(this.units.map((unit) => unit.open(true))).then(() => this);
    this.initialized.catch((error: unknown) => {
      const message = error instanceof Error ? error.message : error;
      if (this.closing) {
        this.logger.debug(`Client for ${formatNodeAddress(address)} closed before it was ready`);
      } else {
        this.logger.error(`Client for ${formatNodeAddress(address)} failed to initialize: ${message}`);
      }
    });
  }

  async executeBatch<A>(batch: Batch<A>, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<A> {
    const replies = await withTimeout(this.pickUnit().execute(batch.commands), timeoutMs);
    return batch.decode(replies);
  }

  async executeOp<A>(op: RedisOp<A>, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<A> {
    return executeOperation(this.pickUnit(), op, timeoutMs);
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = Promise.all(this.units.map((unit) => unit.close())).then(() => {
        this.logger.log(`Client for ${formatNodeAddress(this.address)} closed`);
      });
    }
    return this.closing;
  }

  private pickUnit(): ConnectionUnit {
    if (this.closing) {
      throw new ClientStoppedError(this.address);
    }
    const unit = this.units[this.nextUnit];
    this.nextUnit = (this.nextUnit + 1) % this.units.length;
    return unit;
  }
}
