import { Logger } from '@nestjs/common';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../common/constants/cluster.constants';
import { ClientStoppedError } from '../common/errors/redis.errors';
import { ConnectionDriverFactory } from '../common/interfaces/connection-driver.interface';
import { RedisExecutor } from '../common/interfaces/redis-executor.interface';
import { DEFAULT_NODE_ADDRESS, NodeAddress, formatNodeAddress } from '../common/types/node-address';
import { withTimeout } from '../common/utils/timeout';
import { ConnectionConfig, connectionConfig } from '../config/client-config';
import { noRetryStrategy } from '../config/retry-strategy';
import { ConnectionUnit } from '../connection/connection-unit';
import { ValkeyDriverFactory } from '../driver/factory/valkey-driver.factory';
import { executeOperation } from '../operation/operation-interpreter';
import { Batch } from '../protocol/batch';
import { RedisOp } from '../protocol/operation';
import { Level } from '../protocol/raw-command';

/**
 * Client bound to exactly one physical connection, so commands like WATCH or
 * SELECT keep their effect from one batch to the next. The connection is never
 * re-established: once lost, the client fails every call.
 */
export class RedisConnectionClient implements RedisExecutor {
  private readonly logger = new Logger(RedisConnectionClient.name);
  private readonly unit: ConnectionUnit;
  private closing: Promise<void> | null = null;

  readonly initialized: Promise<this>;

  constructor(
    readonly address: NodeAddress = DEFAULT_NODE_ADDRESS,
    config: ConnectionConfig = connectionConfig(),
    driverFactory: ConnectionDriverFactory = new ValkeyDriverFactory(),
  ) {
    this.unit = new ConnectionUnit({
      address,
      config: { ...config, reconnectionStrategy: noRetryStrategy, retryStrategy: noRetryStrategy },
      driverFactory,
      level: Level.Connection,
      clientName: RedisConnectionClient.name,
    });

    this.initialized = this.unit.open(true).then(() => this);
    this.initialized.catch((error: unknown) => {
      if (!this.closing) {
        this.logger.error(
          `Connection to ${formatNodeAddress(address)} failed to initialize: ${
            error instanceof Error ? error.message : error
          }`,
        );
      }
    });
  }

  async executeBatch<A>(batch: Batch<A>, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<A> {
    this.ensureOpen();
    const replies = await withTimeout(this.unit.execute(batch.commands), timeoutMs);
    return batch.decode(replies);
  }

  async executeOp<A>(op: RedisOp<A>, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<A> {
    this.ensureOpen();
    return executeOperation(this.unit, op, timeoutMs);
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.closing = this.unit.close();
    }
    return this.closing;
  }

  private ensureOpen(): void {
    if (this.closing) {
      throw new ClientStoppedError(this.address);
    }
  }
}
