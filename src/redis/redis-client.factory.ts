import { Inject, Injectable, Logger, OnModuleDestroy } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import {
  CONNECTION_DRIVER_FACTORY,
  ConnectionDriverFactory,
} from '../common/interfaces/connection-driver.interface';
import { RedisExecutor } from '../common/interfaces/redis-executor.interface';
import { formatNodeAddress } from '../common/types/node-address';
import { RedisClusterClient } from '../client/cluster.client';
import { RedisConnectionClient } from '../client/connection.client';
import { RedisNodeClient } from '../client/node.client';
import {
  ClusterConfig,
  ConnectionConfig,
  NodeConfig,
  clusterConfig,
  connectionConfig,
  nodeConfig,
} from '../config/client-config';
import { RedisRuntimeConfig } from '../config/configuration';
import { exponentialBackoff, immediateRetry, maxRetries } from '../config/retry-strategy';
import { LoggingDebugListener } from '../connection/logging-debug-listener';
import { Batch, sequence } from '../protocol/batch';
import { auth, clientSetName, select } from '../protocol/commands';

@Injectable()
export class RedisClientFactory implements OnModuleDestroy {
  private readonly logger = new Logger(RedisClientFactory.name);
  private readonly clients = new Set<RedisExecutor>();

  constructor(
    private readonly configService: ConfigService,
    @Inject(CONNECTION_DRIVER_FACTORY) private readonly driverFactory: ConnectionDriverFactory,
  ) {}

  create(): RedisExecutor {
    const redisConfig = this.configService.get<RedisRuntimeConfig>('redis');
    if (!redisConfig) {
      throw new Error('Redis configuration not found');
    }
    if (redisConfig.nodes.length === 0) {
      throw new Error('REDIS_NODES lists no node');
    }

    const connection = this.connectionConfig(redisConfig);
    const client = this.createClient(redisConfig, connection);
    this.clients.add(client);
    this.logger.log(
      `Created ${redisConfig.mode} client for ${redisConfig.nodes.map((node) => formatNodeAddress(node)).join(', ')}`,
    );
    return client;
  }

  async onModuleDestroy(): Promise<void> {
    const clients = [...this.clients];
    this.clients.clear();
    await Promise.all(clients.map((client) => client.close()));
  }

  private createClient(redisConfig: RedisRuntimeConfig, connection: ConnectionConfig): RedisExecutor {
    const [first] = redisConfig.nodes;
    const node: NodeConfig = nodeConfig({
      poolSize: redisConfig.poolSize,
      connectionConfigs: () => connection,
    });

    switch (redisConfig.mode) {
      case 'connection':
        return new RedisConnectionClient(first, connection, this.driverFactory);
      case 'node':
        return new RedisNodeClient(first, node, this.driverFactory);
      case 'cluster': {
        const { cluster } = redisConfig;
        const config: ClusterConfig = clusterConfig({
          nodeConfigs: () => node,
          monitoringConnectionConfigs: () => connection,
          autoRefreshIntervalMs: cluster.refreshIntervalMs,
          minRefreshIntervalMs: cluster.minRefreshIntervalMs,
          nodesToQueryForState: (mastersCount) => Math.min(mastersCount, cluster.nodesToQuery),
          nodeClientCloseDelayMs: cluster.clientCloseDelayMs,
          maxRedirections: cluster.maxRedirections,
        });
        return new RedisClusterClient(redisConfig.nodes, config, this.driverFactory);
      }
    }
  }

  private connectionConfig(redisConfig: RedisRuntimeConfig): ConnectionConfig {
    const initCommands: Batch<unknown>[] = [];
    if (redisConfig.password) {
      initCommands.push(auth(redisConfig.password, redisConfig.username));
    }
    // Clusters only have database 0.
    if (redisConfig.db !== undefined && redisConfig.mode !== 'cluster') {
      initCommands.push(select(redisConfig.db));
    }
    if (redisConfig.clientName) {
      initCommands.push(clientSetName(redisConfig.clientName));
    }

    return connectionConfig({
      reconnectionStrategy: exponentialBackoff(
        redisConfig.reconnectInitialDelayMs,
        redisConfig.reconnectMaxDelayMs,
      ),
      retryStrategy: maxRetries(immediateRetry(), redisConfig.commandRetries),
      initCommands: initCommands.length > 0 ? sequence(...initCommands) : undefined,
      debugListener: redisConfig.debugTraffic ? new LoggingDebugListener() : undefined,
    });
  }
}
