import { Logger } from '@nestjs/common';
import { ConnectionDriverFactory } from '../common/interfaces/connection-driver.interface';
import { ClientStoppedError, toError } from '../common/errors/redis.errors';
import { NodeAddress, formatNodeAddress } from '../common/types/node-address';
import { Deferred, deferred } from '../common/utils/deferred';
import { MessageLoop } from '../common/utils/message-loop';
import { ClusterConfig } from '../config/client-config';
import { ConnectionUnit } from '../connection/connection-unit';
import { RedisNodeClient } from '../client/node.client';
import { clusterSlots } from '../protocol/commands';
import { ClusterSlotsParser, SlotRangeMapping } from '../protocol/parsers/cluster-slots.parser';
import { Level } from '../protocol/raw-command';
import { RawReply } from '../protocol/reply';
import { SlotMappingEntry, sameMapping, sortMapping } from './slot-mapping';

export type ClusterMapping = readonly SlotMappingEntry<RedisNodeClient>[];

type MonitorMessage =
  | { type: 'refresh'; nodes?: readonly NodeAddress[] }
  | { type: 'slots'; address: NodeAddress; replies: RawReply[] }
  | { type: 'slots-failed'; address: NodeAddress; cause: Error }
  | { type: 'get-client'; address: NodeAddress; reply: Deferred<RedisNodeClient> }
  | { type: 'close-client'; client: RedisNodeClient }
  | { type: 'stop'; done: Deferred<void> };

/**
 * Keeps the slot → node client mapping of a cluster up to date and owns the
 * connections and clients it creates for that. It is the only writer of the
 * mapping; every change is handed to the listener as a new sorted array.
 */
export class ClusterTopologyMonitor extends MessageLoop<MonitorMessage> {
  protected readonly logger = new Logger(ClusterTopologyMonitor.name);

  private readonly slotsQuery = clusterSlots();
  private masters: NodeAddress[] = [];
  private readonly connections = new Map<string, ConnectionUnit>();
  private readonly clients = new Map<string, RedisNodeClient>();
  private readonly closingClients = new Map<RedisNodeClient, NodeJS.Timeout>();
  private mapping: ClusterMapping = [];
  private suspendUntil = 0;
  private refreshTimer: NodeJS.Timeout | null = null;
  private stopped = false;

  constructor(
    private readonly seedNodes: readonly NodeAddress[],
    private readonly config: ClusterConfig,
    private readonly listener: (mapping: ClusterMapping) => void,
    private readonly driverFactory: ConnectionDriverFactory,
    private readonly random: () => number = Math.random,
  ) {
    super();
    if (seedNodes.length === 0) {
      throw new Error('At least one seed node is required');
    }
  }

  get currentMapping(): ClusterMapping {
    return this.mapping;
  }

  /**
   * Queries the seed nodes right away and schedules periodic refreshes.
   */
  start(): void {
    if (this.refreshTimer || this.stopped) {
      return;
    }
    this.tell({ type: 'refresh', nodes: this.seedNodes });
    this.refreshTimer = setInterval(
      () => this.tell({ type: 'refresh' }),
      this.config.autoRefreshIntervalMs,
    );
  }

  /**
   * Asks for a refresh, dropped if the previous honored one was less than
   * `minRefreshIntervalMs` ago.
   */
  refresh(nodes?: readonly NodeAddress[]): void {
    this.tell({ type: 'refresh', nodes });
  }

  getClient(address: NodeAddress): Promise<RedisNodeClient> {
    const reply = deferred<RedisNodeClient>();
    this.tell({ type: 'get-client', address, reply });
    return reply.promise;
  }

  stop(): Promise<void> {
    const done = deferred<void>();
    this.tell({ type: 'stop', done });
    return done.promise;
  }

  protected receive(message: MonitorMessage): void {
    switch (message.type) {
      case 'refresh':
        this.handleRefresh(message.nodes);
        break;
      case 'slots':
        this.handleSlots(message.address, message.replies);
        break;
      case 'slots-failed':
        this.logger.error(
          `Failed to refresh cluster state from ${formatNodeAddress(message.address)}: ${message.cause.message}`,
        );
        break;
      case 'get-client':
        if (this.stopped) {
          message.reply.reject(new ClientStoppedError(message.address));
        } else {
          message.reply.resolve(this.clientFor(message.address));
        }
        break;
      case 'close-client':
        if (this.closingClients.delete(message.client)) {
          void message.client.close();
        }
        break;
      case 'stop':
        this.handleStop(message.done);
        break;
    }
  }

  private handleRefresh(nodes: readonly NodeAddress[] | undefined): void {
    if (this.stopped) {
      return;
    }
    const now = Date.now();
    if (now < this.suspendUntil) {
      this.logger.debug(`Cluster state refresh suspended for another ${this.suspendUntil - now}ms`);
      return;
    }

    const targets = nodes ?? (this.masters.length > 0 ? this.randomMasters() : this.seedNodes);
    this.logger.debug(
      `Refreshing cluster state from ${targets.map((address) => formatNodeAddress(address)).join(', ')}`,
    );

    for (const address of targets) {
      void this.monitoringConnection(address)
        .execute(this.slotsQuery.commands)
        .then(
          (replies) => this.tell({ type: 'slots', address, replies }),
          (error: unknown) => this.tell({ type: 'slots-failed', address, cause: toError(error) }),
        );
    }
    this.suspendUntil = now + this.config.minRefreshIntervalMs;
  }

  private handleSlots(address: NodeAddress, replies: RawReply[]): void {
    let slotRanges: SlotRangeMapping[];
    try {
      slotRanges = this.slotsQuery.decode(replies);
    } catch (error) {
      this.logger.error(
        `Failed to refresh cluster state from ${formatNodeAddress(address)}: ${
          error instanceof Error ? error.message : error
        }`,
      );
      return;
    }
    if (this.stopped) {
      return;
    }

    const newMapping = sortMapping(
      slotRanges.map(({ range, master }) => ({ range, client: this.clientFor(master) })),
    );

    const masters = new Map<string, NodeAddress>();
    for (const { master } of slotRanges) {
      masters.set(formatNodeAddress(master), master);
    }
    this.masters = [...masters.values()];
    for (const master of this.masters) {
      this.monitoringConnection(master);
    }

    if (!sameMapping(this.mapping, newMapping)) {
      this.logger.log(
        `New cluster slot mapping received:\n${slotRanges
          .map(({ range, master }) => `${ClusterSlotsParser.formatRange(range)} -> ${formatNodeAddress(master)}`)
          .join('\n')}`,
      );
      this.mapping = newMapping;
      this.listener(newMapping);
    }

    for (const [key, connection] of this.connections) {
      if (!masters.has(key)) {
        this.connections.delete(key);
        void connection.close();
      }
    }
    for (const [key, client] of this.clients) {
      if (!masters.has(key)) {
        this.clients.delete(key);
        this.scheduleClose(client);
      }
    }
  }

  private handleStop(done: Deferred<void>): void {
    if (this.stopped) {
      done.resolve();
      return;
    }
    this.stopped = true;
    if (this.refreshTimer) {
      clearInterval(this.refreshTimer);
      this.refreshTimer = null;
    }

    const closing: Promise<void>[] = [];
    for (const connection of this.connections.values()) {
      closing.push(connection.close());
    }
    for (const client of this.clients.values()) {
      closing.push(client.close());
    }
    for (const [client, timer] of this.closingClients) {
      clearTimeout(timer);
      closing.push(client.close());
    }
    this.connections.clear();
    this.clients.clear();
    this.closingClients.clear();

    void Promise.allSettled(closing).then(() => {
      this.logger.log('Cluster topology monitor stopped');
      done.resolve();
    });
  }

  /**
   * Uniform sample without replacement (partial Fisher-Yates) of the known masters.
   */
  private randomMasters(): NodeAddress[] {
    const pool = [...this.masters];
    const count = Math.max(0, Math.min(pool.length, this.config.nodesToQueryForState(pool.length)));

    for (let i = 0; i < count; i++) {
      const j = i + Math.floor(this.random() * (pool.length - i));
      [pool[i], pool[j]] = [pool[j], pool[i]];
    }
    return pool.slice(0, count);
  }

  private monitoringConnection(address: NodeAddress): ConnectionUnit {
    const key = formatNodeAddress(address);
    let connection = this.connections.get(key);
    if (!connection) {
      const config = this.config.monitoringConnectionConfigs(address);
      connection = new ConnectionUnit({
        address,
        config,
        driverFactory: this.driverFactory,
        level: Level.Node,
        clientName: ClusterTopologyMonitor.name,
      });
      void connection.open(false);
      this.connections.set(key, connection);
    }
    return connection;
  }

  private clientFor(address: NodeAddress): RedisNodeClient {
    const key = formatNodeAddress(address);
    let client = this.clients.get(key);
    if (!client) {
      client = new RedisNodeClient(address, this.config.nodeConfigs(address), this.driverFactory);
      this.clients.set(key, client);
    }
    return client;
  }

  private scheduleClose(client: RedisNodeClient): void {
    this.logger.log(
      `Closing client for ${formatNodeAddress(client.address)} in ${this.config.nodeClientCloseDelayMs}ms`,
    );
    const timer = setTimeout(
      () => this.tell({ type: 'close-client', client }),
      this.config.nodeClientCloseDelayMs,
    );
    this.closingClients.set(client, timer);
  }
}
