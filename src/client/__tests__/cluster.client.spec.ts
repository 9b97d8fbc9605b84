import { FakeDriverFactory, FakeRedisNode, flush, slotsEntry } from '../../../test/fake-redis';
import {
  ClientStoppedError,
  CrossSlotError,
  NoSlotOwnerError,
  RedisTimeoutError,
  RequiredLevelViolationError,
  TooManyRedirectionsError,
} from '../../common/errors/redis.errors';
import { nodeAddress } from '../../common/types/node-address';
import { clusterConfig, connectionConfig, nodeConfig } from '../../config/client-config';
import { immediateRetry } from '../../config/retry-strategy';
import { sequence, transaction } from '../../protocol/batch';
import { get, incr, ping, set, watch } from '../../protocol/commands';
import { flatMapped, leaf } from '../../protocol/operation';
import { ErrorReply } from '../../protocol/reply';
import { RedisClusterClient } from '../cluster.client';

describe('RedisClusterClient', () => {
  // "bar" hashes to slot 5061 (node A), "foo" to slot 12182 (node B).
  const nodeA = nodeAddress('127.0.0.1', 7000);
  const nodeB = nodeAddress('127.0.0.1', 7001);
  let factory: FakeDriverFactory;
  let a: FakeRedisNode;
  let b: FakeRedisNode;
  let client: RedisClusterClient;

  function createClient(): RedisClusterClient {
    const connection = connectionConfig({ reconnectionStrategy: immediateRetry() });
    client = new RedisClusterClient(
      [nodeA],
      clusterConfig({
        nodeConfigs: () => nodeConfig({ poolSize: 1, connectionConfigs: () => connection }),
        monitoringConnectionConfigs: () => connection,
        autoRefreshIntervalMs: 60_000,
        minRefreshIntervalMs: 0,
      }),
      factory,
    );
    return client;
  }

  function dataCommands(node: FakeRedisNode): string[] {
    return node.commands().filter((command) => command !== 'CLUSTER SLOTS');
  }

  function slotQueries(node: FakeRedisNode): number {
    return node.commands().filter((command) => command === 'CLUSTER SLOTS').length;
  }

  beforeEach(() => {
    factory = new FakeDriverFactory();
    a = factory.node(nodeA);
    b = factory.node(nodeB);
    const slots = [slotsEntry(0, 8191, nodeA), slotsEntry(8192, 16383, nodeB)];
    a.clusterSlots = slots;
    b.clusterSlots = slots;
  });

  afterEach(async () => {
    await client.close();
  });

  describe('Routing', () => {
    it('should queue work submitted before the first mapping arrives', async () => {
      createClient();
      a.data.set('bar', 'early');

      await expect(client.executeBatch(get('bar'))).resolves.toBe('early');
      await expect(client.initialized).resolves.toBe(client);
    });

    it('should split a batch by node and reassemble replies in order', async () => {
      createClient();
      a.data.set('bar', 'from-a');
      b.data.set('foo', 'from-b');

      await expect(client.executeBatch(sequence(get('foo'), get('bar'), incr('foo:n')))).resolves.toEqual([
        'from-b',
        'from-a',
        1,
      ]);
      expect(dataCommands(a)).toContain('GET bar');
      expect(dataCommands(b)).toContain('GET foo');
      expect(dataCommands(a)).not.toContain('GET foo');
    });

    it('should send keyless commands to the first mapped node', async () => {
      createClient();

      await expect(client.executeBatch(ping())).resolves.toBe('PONG');
      expect(dataCommands(a)).toEqual(['PING']);
      expect(dataCommands(b)).toEqual([]);
    });

    it('should expose the current slot mapping', async () => {
      createClient();
      await client.initialized;

      expect(client.clusterState.clientForSlot(12182).address).toEqual(nodeB);
      expect(client.clusterState.clientForSlot(5061).address).toEqual(nodeA);
    });

    it('should fail when no node owns the slot', async () => {
      a.clusterSlots = [slotsEntry(0, 8191, nodeA)];
      createClient();

      await expect(client.executeBatch(get('foo'))).rejects.toThrow(new NoSlotOwnerError(12182));
    });

    it('should reject commands that change connection state', async () => {
      createClient();

      await expect(client.executeBatch(watch('foo'))).rejects.toThrow(
        new RequiredLevelViolationError('WATCH', 'RedisClusterClient'),
      );
    });
  });

  describe('Transactions', () => {
    it('should run a single-slot transaction on its node', async () => {
      createClient();

      await expect(
        client.executeBatch(transaction(sequence(set('{user1}.name', 'ada'), incr('{user1}.visits')))),
      ).resolves.toEqual(['OK', 1]);
    });

    it('should reject a transaction spanning several slots', async () => {
      createClient();

      await expect(client.executeBatch(transaction(sequence(set('foo', '1'), set('bar', '2'))))).rejects.toThrow(
        CrossSlotError,
      );
      expect(dataCommands(a)).toEqual([]);
      expect(dataCommands(b)).toEqual([]);
    });

    it('should re-send a moved transaction whole', async () => {
      createClient();
      b.handle('SET', () => new ErrorReply('MOVED 12182 127.0.0.1:7000'));

      await expect(client.executeBatch(transaction(set('foo', 'x')))).resolves.toBe('OK');
      expect(dataCommands(a)).toEqual(['MULTI', 'SET foo x', 'EXEC']);
      expect(a.data.get('foo')).toBe('x');
    });
  });

  describe('Redirections', () => {
    it('should follow MOVED and refresh the mapping', async () => {
      createClient();
      await client.initialized;
      b.handle('GET', (args) => (args[1] === 'foo' ? new ErrorReply('MOVED 12182 127.0.0.1:7000') : undefined));
      a.data.set('foo', 'moved');

      await expect(client.executeBatch(get('foo'))).resolves.toBe('moved');
      await flush();

      expect(slotQueries(b)).toBe(1);
    });

    it('should follow ASK with ASKING and leave the mapping alone', async () => {
      createClient();
      await client.initialized;
      b.handle('GET', (args) => (args[1] === 'foo' ? new ErrorReply('ASK 12182 127.0.0.1:7000') : undefined));
      a.handle('GET', (args, context) =>
        args[1] === 'foo' && !context.asking ? new ErrorReply('MOVED 12182 127.0.0.1:7001') : undefined,
      );
      a.data.set('foo', 'migrating');

      await expect(client.executeBatch(get('foo'))).resolves.toBe('migrating');
      await flush();

      expect(dataCommands(a)).toEqual(['ASKING', 'GET foo']);
      expect(slotQueries(b)).toBe(0);
    });

    it('should give up after too many redirections', async () => {
      createClient();
      b.handle('GET', () => new ErrorReply('MOVED 12182 127.0.0.1:7001'));

      await expect(client.executeBatch(get('foo'))).rejects.toThrow(new TooManyRedirectionsError(3));
      expect(dataCommands(b)).toEqual(['GET foo', 'GET foo', 'GET foo', 'GET foo']);
    });
  });

  describe('Operations', () => {
    it('should run an operation on the node owning its first key', async () => {
      createClient();
      b.data.set('foo', 'x');
      const op = flatMapped(sequence(watch('foo'), get('foo')), ([, value]) =>
        leaf(transaction(set('foo', `${value}!`))),
      );

      await expect(client.executeOp(op)).resolves.toBe('OK');
      expect(b.data.get('foo')).toBe('x!');
      expect(dataCommands(b)).toEqual(['WATCH foo', 'GET foo', 'MULTI', 'SET foo x!', 'EXEC']);
    });

    it('should count the wait for the first mapping against the timeout', async () => {
      a.holdReplies = true;
      b.holdReplies = true;
      createClient();
      const release = setTimeout(() => a.releaseReplies(), 120);
      const startedAt = Date.now();

      await expect(client.executeOp(leaf(get('foo')), 200)).rejects.toThrow(RedisTimeoutError);

      expect(Date.now() - startedAt).toBeLessThan(290);
      clearTimeout(release);
    });
  });

  describe('Closing', () => {
    it('should stop every connection and reject later calls', async () => {
      createClient();
      await client.initialized;

      await client.close();

      await expect(client.executeBatch(get('foo'))).rejects.toThrow(ClientStoppedError);
      expect(factory.drivers.every((driver) => !driver.connected)).toBe(true);
    });
  });
});
