import { FakeDriverFactory, FakeRedisNode } from '../../../test/fake-redis';
import {
  ClientStoppedError,
  RedisTimeoutError,
  RequiredLevelViolationError,
} from '../../common/errors/redis.errors';
import { nodeAddress } from '../../common/types/node-address';
import { connectionConfig, nodeConfig } from '../../config/client-config';
import { immediateRetry } from '../../config/retry-strategy';
import { sequence, transaction } from '../../protocol/batch';
import { get, ping, select, set, watch } from '../../protocol/commands';
import { flatMapped, leaf } from '../../protocol/operation';
import { RedisNodeClient } from '../node.client';

describe('RedisNodeClient', () => {
  const address = nodeAddress('127.0.0.1', 6379);
  let factory: FakeDriverFactory;
  let node: FakeRedisNode;
  let client: RedisNodeClient;

  function createClient(poolSize: number): RedisNodeClient {
    const connection = connectionConfig({ reconnectionStrategy: immediateRetry() });
    client = new RedisNodeClient(
      address,
      nodeConfig({ poolSize, connectionConfigs: () => connection }),
      factory,
    );
    return client;
  }

  beforeEach(() => {
    factory = new FakeDriverFactory();
    node = factory.node(address);
  });

  afterEach(async () => {
    node.releaseReplies();
    await client.close();
  });

  it('should resolve initialized with itself once every connection is up', async () => {
    createClient(3);

    await expect(client.initialized).resolves.toBe(client);
    expect(node.connectionsOpened).toBe(3);
  });

  it('should decode SET then GET sequenced into one batch', async () => {
    createClient(2);

    await expect(client.executeBatch(sequence(set('k', 'v'), get('k')))).resolves.toEqual(['OK', 'v']);
  });

  it('should spread batches over the pool in turn', async () => {
    createClient(2);
    await client.initialized;

    await client.executeBatch(ping());
    await client.executeBatch(ping());
    await client.executeBatch(ping());

    expect(node.wire.map((entry) => entry.connection)).toEqual([1, 2, 1]);
  });

  it('should reject commands that change connection state', async () => {
    createClient(1);

    await expect(client.executeBatch(select(1))).rejects.toThrow(
      new RequiredLevelViolationError('SELECT', 'RedisNodeClient'),
    );
  });

  it('should keep a concurrent batch behind a WATCH/MULTI/EXEC operation', async () => {
    createClient(1);
    await client.initialized;
    const op = flatMapped(sequence(watch('k'), get('k')), () => leaf(transaction(set('k', 'mine'))));

    const opResult = client.executeOp(op);
    const other = client.executeBatch(set('k', 'theirs'));

    await expect(opResult).resolves.toBe('OK');
    await expect(other).resolves.toBe('OK');
    expect(node.commands()).toEqual(['WATCH k', 'GET k', 'MULTI', 'SET k mine', 'EXEC', 'SET k theirs']);
    expect(node.data.get('k')).toBe('theirs');
  });

  it('should time out a batch that gets no reply', async () => {
    createClient(1);
    await client.initialized;
    node.holdReplies = true;

    await expect(client.executeBatch(get('k'), 20)).rejects.toThrow(new RedisTimeoutError(20));
  });

  it('should reject calls after close', async () => {
    createClient(2);
    await client.initialized;

    await client.close();

    await expect(client.executeBatch(ping())).rejects.toThrow(
      new ClientStoppedError(address),
    );
    await expect(client.executeBatch(ping())).rejects.toThrow('Client for 127.0.0.1:6379 has been stopped');
    expect(factory.drivers.every((driver) => !driver.connected)).toBe(true);
  });

  it('should require at least one connection', () => {
    expect(() => new RedisNodeClient(address, nodeConfig({ poolSize: 0 }), factory)).toThrow(
      'Pool size must be at least 1, got 0',
    );
    createClient(1);
  });
});
