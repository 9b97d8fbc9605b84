import { Logger } from '@nestjs/common';
import { DEFAULT_COMMAND_TIMEOUT_MS } from '../common/constants/cluster.constants';
import {
  ClientStoppedError,
  CrossSlotError,
  TooManyRedirectionsError,
} from '../common/errors/redis.errors';
import { ConnectionDriverFactory } from '../common/interfaces/connection-driver.interface';
import { RedisExecutor } from '../common/interfaces/redis-executor.interface';
import { DEFAULT_NODE_ADDRESS, NodeAddress, parseNodeAddress } from '../common/types/node-address';
import { deferred } from '../common/utils/deferred';
import { withTimeout } from '../common/utils/timeout';
import { ClusterConfig, clusterConfig } from '../config/client-config';
import { ClusterMapping, ClusterTopologyMonitor } from '../cluster/cluster-topology-monitor';
import { ClusterState } from '../cluster/cluster-state';
import { ValkeyDriverFactory } from '../driver/factory/valkey-driver.factory';
import { Batch, rawBatch } from '../protocol/batch';
import { asking } from '../protocol/commands';
import { RedisOp, firstCommands } from '../protocol/operation';
import { Level, RawCommand, keySlot, requireLevel } from '../protocol/raw-command';
import { RawReply, Redirection, parseRedirection } from '../protocol/reply';
import { RedisNodeClient } from './node.client';

const ASKING = asking().commands[0];

interface RedirectedGroup {
  readonly redirection: Redirection;
  readonly indexes: number[];
}

/**
 * Routes work to the node clients of a cluster by key slot, following MOVED
 * and ASK redirections.
 */
export class RedisClusterClient implements RedisExecutor {
  private readonly logger = new Logger(RedisClusterClient.name);
  private readonly monitor: ClusterTopologyMonitor;
  private readonly ready = deferred<void>();
  private state = new ClusterState([]);
  private closing: Promise<void> | null = null;

  readonly initialized: Promise<this>;

  constructor(
    seedNodes: readonly NodeAddress[] = [DEFAULT_NODE_ADDRESS],
    private readonly config: ClusterConfig = clusterConfig(),
    driverFactory: ConnectionDriverFactory = new ValkeyDriverFactory(),
  ) {
    this.monitor = new ClusterTopologyMonitor(
      seedNodes,
      config,
      (mapping) => this.onMapping(mapping),
      driverFactory,
    );

    this.initialized = this.ready.promise.then(() => this);
    this.initialized.catch((error: unknown) => {
      this.logger.debug(
        `Cluster client never became ready: ${error instanceof Error ? error.message : error}`,
      );
    });
    this.monitor.start();
  }

  get clusterState(): ClusterState {
    return this.state;
  }

  async executeBatch<A>(batch: Batch<A>, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<A> {
    this.ensureOpen();
    requireLevel(batch.commands, Level.Cluster, RedisClusterClient.name);
    if (batch.commands.length === 0) {
      return batch.decode([]);
    }

    const slots = distinctSlots(batch.commands);
    if (batch.transactional && slots.length > 1) {
      throw new CrossSlotError(slots);
    }

    const replies = await withTimeout(
      batch.transactional
        ? this.executeTransaction(batch.commands, slots[0], timeoutMs)
        : this.executePipeline(batch.commands, timeoutMs),
      timeoutMs,
    );
    return batch.decode(replies);
  }

  /**
   * Runs the whole operation on the node owning the first key of its first step.
   */
  async executeOp<A>(op: RedisOp<A>, timeoutMs: number = DEFAULT_COMMAND_TIMEOUT_MS): Promise<A> {
    this.ensureOpen();
    const deadline = Date.now() + timeoutMs;
    await withTimeout(this.ready.promise, timeoutMs);

    const [slot] = distinctSlots(firstCommands(op));
    const client = slot === undefined ? this.state.anyClient() : this.state.clientForSlot(slot);
    // The wait for the first mapping counts against the caller's timeout.
    return client.executeOp(op, Math.max(1, deadline - Date.now()));
  }

  close(): Promise<void> {
    if (!this.closing) {
      this.ready.reject(new ClientStoppedError());
      this.closing = this.monitor.stop().then(() => {
        this.logger.log('Cluster client closed');
      });
    }
    return this.closing;
  }

  private onMapping(mapping: ClusterMapping): void {
    this.state = new ClusterState(mapping);
    this.ready.resolve();
  }

  private async executeTransaction(
    commands: readonly RawCommand[],
    slot: number | undefined,
    timeoutMs: number,
  ): Promise<RawReply[]> {
    await this.ready.promise;
    let client = slot === undefined ? this.state.anyClient() : this.state.clientForSlot(slot);

    for (let redirections = 0; ; redirections++) {
      const replies = await client.executeBatch(rawBatch(commands), timeoutMs);
      const moved = replies
        .map((reply) => parseRedirection(reply))
        .find((redirection) => redirection?.kind === 'MOVED');
      if (!moved) {
        return replies;
      }
      if (redirections >= this.config.maxRedirections) {
        throw new TooManyRedirectionsError(this.config.maxRedirections);
      }
      client = await this.redirectionTarget(moved);
    }
  }

  private async executePipeline(commands: readonly RawCommand[], timeoutMs: number): Promise<RawReply[]> {
    await this.ready.promise;

    const groups = new Map<RedisNodeClient, number[]>();
    commands.forEach((command, index) => {
      const slot = keySlot(command);
      const client = slot === undefined ? this.state.anyClient() : this.state.clientForSlot(slot);
      const indexes = groups.get(client);
      if (indexes) {
        indexes.push(index);
      } else {
        groups.set(client, [index]);
      }
    });

    const replies = new Array<RawReply>(commands.length).fill(null);
    await Promise.all(
      [...groups].map(([client, indexes]) =>
        this.executeGroup(client, commands, indexes, replies, false, 0, timeoutMs),
      ),
    );
    return replies;
  }

  /**
   * Sends the commands at `indexes` to one node and writes their replies into
   * `replies`. Redirected commands are sent on to their new node, prefixed by
   * ASKING when the redirection is an ASK.
   */
  private async executeGroup(
    client: RedisNodeClient,
    commands: readonly RawCommand[],
    indexes: readonly number[],
    replies: RawReply[],
    withAsking: boolean,
    redirections: number,
    timeoutMs: number,
  ): Promise<void> {
    const sent = indexes.flatMap((index) => (withAsking ? [ASKING, commands[index]] : [commands[index]]));
    const received = await client.executeBatch(rawBatch(sent), timeoutMs);
    const stride = withAsking ? 2 : 1;

    const redirected = new Map<string, RedirectedGroup>();
    indexes.forEach((index, position) => {
      const reply = received[position * stride + stride - 1];
      const redirection = parseRedirection(reply);
      if (!redirection) {
        replies[index] = reply;
        return;
      }
      const key = `${redirection.kind} ${redirection.address}`;
      const group = redirected.get(key);
      if (group) {
        group.indexes.push(index);
      } else {
        redirected.set(key, { redirection, indexes: [index] });
      }
    });

    if (redirected.size === 0) {
      return;
    }
    if (redirections >= this.config.maxRedirections) {
      throw new TooManyRedirectionsError(this.config.maxRedirections);
    }

    await Promise.all(
      [...redirected.values()].map(async ({ redirection, indexes: moved }) => {
        const target = await this.redirectionTarget(redirection);
        await this.executeGroup(
          target,
          commands,
          moved,
          replies,
          redirection.kind === 'ASK',
          redirections + 1,
          timeoutMs,
        );
      }),
    );
  }

  private redirectionTarget(redirection: Redirection): Promise<RedisNodeClient> {
    this.logger.warn(`Slot ${redirection.slot} redirected (${redirection.kind}) to ${redirection.address}`);
    if (redirection.kind === 'MOVED') {
      this.monitor.refresh();
    }
    return this.monitor.getClient(parseNodeAddress(redirection.address));
  }

  private ensureOpen(): void {
    if (this.closing) {
      throw new ClientStoppedError();
    }
  }
}

function distinctSlots(commands: readonly RawCommand[]): number[] {
  const slots = new Set<number>();
  for (const command of commands) {
    const slot = keySlot(command);
    if (slot !== undefined) {
      slots.add(slot);
    }
  }
  return [...slots];
}
