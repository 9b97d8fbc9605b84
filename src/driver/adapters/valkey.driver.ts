import { Logger } from '@nestjs/common';
import Valkey from 'iovalkey';
import { ConnectionDriver } from '../../common/interfaces/connection-driver.interface';
import { NodeAddress, formatNodeAddress } from '../../common/types/node-address';
import { ProtocolError } from '../../common/errors/redis.errors';
import { RawCommand } from '../../protocol/raw-command';
import { ErrorReply, RawReply, toRawReply } from '../../protocol/reply';

export interface ValkeyDriverConfig {
  address: NodeAddress;
  connectTimeoutMs: number;
}

/**
 * iovalkey does the RESP encoding, decoding and socket handling. Its own
 * reconnection, offline queue and command resending are switched off.
 */
export class ValkeyDriver implements ConnectionDriver {
  private readonly logger = new Logger(ValkeyDriver.name);
  private readonly client: Valkey;
  private readonly closeListeners: Array<(cause: Error) => void> = [];
  private lastError: Error | null = null;
  private closed = false;

  constructor(private readonly config: ValkeyDriverConfig) {
    this.client = new Valkey({
      host: config.address.host,
      port: config.address.port,
      lazyConnect: true,
      connectTimeout: config.connectTimeoutMs,
      enableOfflineQueue: false,
      enableReadyCheck: false,
      autoResendUnfulfilledCommands: false,
      autoResubscribe: false,
      maxRetriesPerRequest: null,
      retryStrategy: () => null,
    });

    this.client.on('error', (error: Error) => {
      this.lastError = error;
      this.logger.debug(`Connection error on ${formatNodeAddress(config.address)}: ${error.message}`);
    });

    this.client.on('close', () => {
      if (this.closed) return;
      this.closed = true;
      const cause = this.lastError ?? new Error('Connection closed');
      for (const listener of this.closeListeners) {
        listener(cause);
      }
    });
  }

  async connect(): Promise<void> {
    await this.client.connect();
  }

  async execute(commands: readonly RawCommand[]): Promise<RawReply[]> {
    const pipeline = this.client.pipeline(commands.map((command) => ['call', ...command.args]));
    const results = await pipeline.exec();

    if (!results || results.length !== commands.length) {
      throw new ProtocolError(
        `Expected ${commands.length} replies from ${formatNodeAddress(this.config.address)}, got ${
          results ? results.length : 'none'
        }`,
      );
    }

    return results.map(([error, result]) => {
      if (error) {
        // Error replies are parsed as ReplyError; anything else is a transport failure.
        if (error.name === 'ReplyError') {
          return new ErrorReply(error.message);
        }
        throw error;
      }
      return toRawReply(result);
    });
  }

  onClose(listener: (cause: Error) => void): void {
    this.closeListeners.push(listener);
  }

  async disconnect(): Promise<void> {
    const { status } = this.client;
    if (status === 'end') {
      return;
    }
    if (status !== 'ready' && status !== 'connect') {
      this.client.disconnect();
      return;
    }
    try {
      await this.client.quit();
    } catch (error) {
      this.logger.warn(
        `Failed to quit ${formatNodeAddress(this.config.address)} gracefully: ${
          error instanceof Error ? error.message : error
        }`,
      );
      this.client.disconnect();
    }
  }
}
