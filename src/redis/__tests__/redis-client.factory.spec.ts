import { ConfigService } from '@nestjs/config';
import { FakeDriverFactory, slotsEntry } from '../../../test/fake-redis';
import { RedisExecutor } from '../../common/interfaces/redis-executor.interface';
import { nodeAddress } from '../../common/types/node-address';
import { RedisClusterClient } from '../../client/cluster.client';
import { RedisConnectionClient } from '../../client/connection.client';
import { RedisNodeClient } from '../../client/node.client';
import { RedisRuntimeConfig } from '../../config/configuration';
import { ping } from '../../protocol/commands';
import { RedisClientFactory } from '../redis-client.factory';

describe('RedisClientFactory', () => {
  const address = nodeAddress('127.0.0.1', 6400);
  let driverFactory: FakeDriverFactory;
  let factory: RedisClientFactory;

  function runtimeConfig(overrides: Partial<RedisRuntimeConfig> = {}): RedisRuntimeConfig {
    return {
      mode: 'node',
      nodes: [address],
      poolSize: 2,
      reconnectInitialDelayMs: 10,
      reconnectMaxDelayMs: 100,
      commandRetries: 1,
      cluster: {
        refreshIntervalMs: 60_000,
        minRefreshIntervalMs: 0,
        nodesToQuery: 1,
        clientCloseDelayMs: 100,
        maxRedirections: 2,
      },
      debugTraffic: false,
      ...overrides,
    };
  }

  function createFactory(redis: RedisRuntimeConfig | undefined): RedisClientFactory {
    const configService = new ConfigService(redis ? { redis } : {});
    factory = new RedisClientFactory(configService, driverFactory);
    return factory;
  }

  async function ready(client: RedisExecutor): Promise<void> {
    await client.initialized;
    await client.executeBatch(ping());
  }

  beforeEach(() => {
    driverFactory = new FakeDriverFactory();
  });

  afterEach(async () => {
    await factory.onModuleDestroy();
  });

  it('should build a node client with its init commands', async () => {
    createFactory(runtimeConfig({ password: 'test-secret', username: 'app', db: 3, clientName: 'worker' }));

    const client = factory.create();
    await ready(client);

    expect(client).toBeInstanceOf(RedisNodeClient);
    expect(driverFactory.node(address).wire.filter((entry) => entry.connection === 1).map((entry) => entry.command)).toEqual([
      'AUTH app test-secret',
      'SELECT 3',
      'CLIENT SETNAME worker',
      'PING',
    ]);
    expect(driverFactory.node(address).connectionsOpened).toBe(2);
  });

  it('should build a connection client', async () => {
    createFactory(runtimeConfig({ mode: 'connection' }));

    const client = factory.create();
    await ready(client);

    expect(client).toBeInstanceOf(RedisConnectionClient);
  });

  it('should build a cluster client and skip SELECT', async () => {
    driverFactory.node(address).clusterSlots = [slotsEntry(0, 16383, address)];
    createFactory(runtimeConfig({ mode: 'cluster', db: 3 }));

    const client = factory.create();
    await ready(client);

    expect(client).toBeInstanceOf(RedisClusterClient);
    expect(driverFactory.node(address).commands()).not.toContain('SELECT 3');
  });

  it('should close every client it created', async () => {
    createFactory(runtimeConfig());
    const client = factory.create();
    await ready(client);

    await factory.onModuleDestroy();

    expect(driverFactory.drivers.every((driver) => !driver.connected)).toBe(true);
  });

  it('should fail without configuration', () => {
    createFactory(undefined);

    expect(() => factory.create()).toThrow('Redis configuration not found');
  });

  it('should fail without nodes', () => {
    createFactory(runtimeConfig({ nodes: [] }));

    expect(() => factory.create()).toThrow('REDIS_NODES lists no node');
  });
});
