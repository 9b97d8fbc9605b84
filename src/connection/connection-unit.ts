import { Logger } from '@nestjs/common';
import {
  ConnectionDriver,
  ConnectionDriverFactory,
} from '../common/interfaces/connection-driver.interface';
import {
  AbortedOperationError,
  ClientStoppedError,
  ConnectionFaultError,
  ProtocolError,
  toError,
} from '../common/errors/redis.errors';
import { NodeAddress, formatNodeAddress } from '../common/types/node-address';
import { Deferred, deferred } from '../common/utils/deferred';
import { MessageLoop } from '../common/utils/message-loop';
import { ConnectionConfig } from '../config/client-config';
import { Level, RawCommand, encodedSize, requireLevel } from '../protocol/raw-command';
import { RawReply } from '../protocol/reply';

export type ConnectionState = 'disconnected' | 'connecting' | 'connected' | 'closing' | 'closed';

/**
 * Identity of a caller that may hold a unit's reservation.
 */
export class ReservationToken {
  private static nextId = 1;
  readonly id = ReservationToken.nextId++;
}

interface PendingRequest {
  readonly commands: readonly RawCommand[];
  readonly owner: ReservationToken | null;
  readonly reserving: boolean;
  readonly reply: Deferred<RawReply[]>;
  retries: number;
}

type UnitMessage =
  | { type: 'open'; mustInitiallyConnect: boolean }
  | { type: 'execute'; request: PendingRequest }
  | { type: 'release'; owner: ReservationToken }
  | { type: 'reconnect'; generation: number }
  | { type: 'connected'; generation: number }
  | { type: 'connect-failed'; generation: number; cause: Error }
  | { type: 'connection-lost'; generation: number; cause: Error }
  | { type: 'replied'; generation: number; request: PendingRequest; replies: RawReply[] }
  | { type: 'request-failed'; generation: number; request: PendingRequest; cause: Error }
  | { type: 'close'; done: Deferred<void> };

export interface ConnectionUnitOptions {
  address: NodeAddress;
  config: ConnectionConfig;
  driverFactory: ConnectionDriverFactory;
  /** Narrowest command level accepted outside a reservation. */
  level: Level;
  /** Client surface named in level violations. */
  clientName: string;
}

/**
 * Owns one logical connection to one node: connects, reconnects, and writes
 * batches in the order they were accepted, handing replies back in that same
 * order. A caller may reserve the unit so that nothing but its own batches
 * reaches the wire until it releases it.
 */
export class ConnectionUnit extends MessageLoop<UnitMessage> {
  protected readonly logger: Logger;

  readonly address: NodeAddress;
  private readonly config: ConnectionConfig;
  private readonly driverFactory: ConnectionDriverFactory;
  private readonly level: Level;
  private readonly clientName: string;

  private state: ConnectionState = 'disconnected';
  private driver: ConnectionDriver | null = null;
  // Bumped whenever the current driver is abandoned; completions of older generations are stale.
  private generation = 0;
  private reconnectAttempts = 0;
  private reconnectTimer: NodeJS.Timeout | null = null;

  private readonly queue: PendingRequest[] = [];
  private readonly inFlight: PendingRequest[] = [];
  private reservedBy: ReservationToken | null = null;
  // Holder whose connection was lost under the reservation; its further batches fail.
  private brokenReservation: ReservationToken | null = null;

  private readonly ready = deferred<void>();
  private failure: Error | null = null;
  private readonly terminationListeners = new Set<(cause: Error) => void>();

  constructor(options: ConnectionUnitOptions) {
    super();
    this.address = options.address;
    this.config = options.config;
    this.driverFactory = options.driverFactory;
    this.level = options.level;
    this.clientName = options.clientName;
    this.logger = new Logger(options.config.actorName ?? ConnectionUnit.name);

    this.ready.promise.catch((error: unknown) => {
      this.logger.debug(
        `${this.describe()} never became ready: ${error instanceof Error ? error.message : error}`,
      );
    });
  }

  get connectionState(): ConnectionState {
    return this.state;
  }

  get reserved(): boolean {
    return this.reservedBy !== null;
  }

  /**
   * Starts connecting. With `mustInitiallyConnect` the returned promise waits
   * for the first successful connection; otherwise it resolves at once and
   * work is queued until the unit connects.
   */
  open(mustInitiallyConnect: boolean): Promise<void> {
    this.tell({ type: 'open', mustInitiallyConnect });
    return this.ready.promise;
  }

  execute(commands: readonly RawCommand[], owner: ReservationToken | null = null): Promise<RawReply[]> {
    return this.submit(commands, owner, false);
  }

  /**
   * Executes the batch and, once it is on the wire, keeps every other caller's
   * work queued until `release(owner)`.
   */
  reserving(commands: readonly RawCommand[], owner: ReservationToken): Promise<RawReply[]> {
    return this.submit(commands, owner, true);
  }

  release(owner: ReservationToken): void {
    this.tell({ type: 'release', owner });
  }

  close(): Promise<void> {
    const done = deferred<void>();
    this.tell({ type: 'close', done });
    return done.promise;
  }

  /**
   * Subscribes to the unit reaching its terminal state. Returns the unsubscribe function.
   */
  onTerminated(listener: (cause: Error) => void): () => void {
    if (this.state === 'closed') {
      listener(this.failure ?? new ClientStoppedError(this.address));
      return () => undefined;
    }
    this.terminationListeners.add(listener);
    return () => {
      this.terminationListeners.delete(listener);
    };
  }

  protected receive(message: UnitMessage): void {
    switch (message.type) {
      case 'open':
        this.handleOpen(message.mustInitiallyConnect);
        break;
      case 'execute':
        this.handleExecute(message.request);
        break;
      case 'release':
        this.handleRelease(message.owner);
        break;
      case 'reconnect':
        if (message.generation === this.generation && this.state === 'connecting') {
          this.reconnectTimer = null;
          this.connect();
        }
        break;
      case 'connected':
        this.handleConnected(message.generation);
        break;
      case 'connect-failed':
      case 'connection-lost':
        if (message.generation === this.generation) {
          this.handleLost(message.cause);
        }
        break;
      case 'replied':
        this.handleReplied(message.generation, message.request, message.replies);
        break;
      case 'request-failed':
        this.handleRequestFailed(message.generation, message.request, message.cause);
        break;
      case 'close':
        this.handleClose(message.done);
        break;
    }
  }

  private submit(
    commands: readonly RawCommand[],
    owner: ReservationToken | null,
    reserving: boolean,
  ): Promise<RawReply[]> {
    const reply = deferred<RawReply[]>();
    this.tell({ type: 'execute', request: { commands, owner, reserving, reply, retries: 0 } });
    return reply.promise;
  }

  private handleOpen(mustInitiallyConnect: boolean): void {
    if (this.state !== 'disconnected') {
      return;
    }
    if (!mustInitiallyConnect) {
      this.ready.resolve();
    }
    this.connect();
  }

  private handleExecute(request: PendingRequest): void {
    if (this.state === 'closing' || this.state === 'closed') {
      request.reply.reject(this.failure ?? new ClientStoppedError(this.address));
      return;
    }

    if (request.owner === null) {
      try {
        requireLevel(request.commands, this.level, this.clientName);
      } catch (error) {
        request.reply.reject(toError(error));
        return;
      }
    } else if (request.owner === this.brokenReservation) {
      request.reply.reject(this.reservationLost());
      return;
    }

    if (request.commands.length === 0) {
      request.reply.resolve([]);
      return;
    }

    this.queue.push(request);
    this.processQueue();
  }

  private handleRelease(owner: ReservationToken): void {
    if (this.brokenReservation === owner) {
      this.brokenReservation = null;
    }
    // Work the owner queued but never got on the wire must not take the reservation later.
    for (let i = this.queue.length - 1; i >= 0; i--) {
      if (this.queue[i].owner === owner) {
        const [request] = this.queue.splice(i, 1);
        request.reply.reject(new AbortedOperationError('reservation released before the batch was sent'));
      }
    }
    if (this.reservedBy !== owner) {
      return;
    }
    this.reservedBy = null;
    this.processQueue();
  }

  private processQueue(): void {
    while (this.state === 'connected' && this.driver && this.queue.length > 0) {
      const owner = this.reservedBy;
      // The holder's work skips the queue; everyone else waits in arrival order.
      const index = owner === null ? 0 : this.queue.findIndex((request) => request.owner === owner);
      if (index === -1) {
        return;
      }

      const [request] = this.queue.splice(index, 1);
      if (request.reserving && this.reservedBy === null) {
        this.reservedBy = request.owner;
      }
      this.send(this.driver, request);
    }
  }

  private send(driver: ConnectionDriver, request: PendingRequest): void {
    const generation = this.generation;
    this.inFlight.push(request);
    this.config.debugListener?.onWrite(this.address, encodedSize(request.commands));

    void driver.execute(request.commands).then(
      (replies) => this.tell({ type: 'replied', generation, request, replies }),
      (error: unknown) =>
        this.tell({ type: 'request-failed', generation, request, cause: toError(error) }),
    );
  }

  private handleReplied(generation: number, request: PendingRequest, replies: RawReply[]): void {
    const index = this.inFlight.indexOf(request);
    if (generation !== this.generation || index === -1) {
      // Reply from an abandoned connection; its caller was already answered.
      return;
    }
    this.inFlight.splice(index, 1);
    this.config.debugListener?.onReceive(this.address, replies.length);

    if (replies.length !== request.commands.length) {
      const error = new ProtocolError(
        `Expected ${request.commands.length} replies from ${this.describe()}, got ${replies.length}`,
      );
      request.reply.reject(error);
      this.handleLost(error);
      return;
    }

    request.reply.resolve(replies);
  }

  private handleRequestFailed(generation: number, request: PendingRequest, cause: Error): void {
    const index = this.inFlight.indexOf(request);
    if (generation !== this.generation || index === -1) {
      return;
    }
    if (cause instanceof ProtocolError) {
      this.inFlight.splice(index, 1);
      request.reply.reject(cause);
    }
    // A transport failure of one pipeline means the stream can no longer be trusted.
    this.handleLost(cause);
  }

  private connect(): void {
    const generation = ++this.generation;
    this.state = 'connecting';

    let driver: ConnectionDriver;
    try {
      driver = this.driverFactory.create(this.address, this.config);
    } catch (error) {
      this.tell({ type: 'connect-failed', generation, cause: toError(error) });
      return;
    }

    this.driver = driver;
    driver.onClose((cause) => this.tell({ type: 'connection-lost', generation, cause }));

    void this.establish(driver).then(
      () => this.tell({ type: 'connected', generation }),
      (error: unknown) => this.tell({ type: 'connect-failed', generation, cause: toError(error) }),
    );
  }

  private async establish(driver: ConnectionDriver): Promise<void> {
    await driver.connect();

    const { initCommands } = this.config;
    if (initCommands && initCommands.commands.length > 0) {
      this.config.debugListener?.onWrite(this.address, encodedSize(initCommands.commands));
      const replies = await driver.execute(initCommands.commands);
      this.config.debugListener?.onReceive(this.address, replies.length);
      initCommands.decode(replies);
    }
  }

  private handleConnected(generation: number): void {
    if (generation !== this.generation || this.state !== 'connecting') {
      return;
    }
    this.state = 'connected';
    this.reconnectAttempts = 0;
    this.logger.log(`Connected to ${this.describe()}`);

    this.ready.resolve();
    this.processQueue();
  }

  private handleLost(cause: Error): void {
    if (this.state !== 'connecting' && this.state !== 'connected') {
      return;
    }
    const wasConnected = this.state === 'connected';
    this.generation += 1;
    this.discardDriver();

    if (wasConnected) {
      this.logger.warn(`Connection to ${this.describe()} lost: ${cause.message}`);
    } else {
      this.logger.warn(`Failed to connect to ${this.describe()}: ${cause.message}`);
    }

    this.recoverInFlight(cause);
    this.scheduleReconnect(cause);
  }

  /**
   * Unanswered batches are sent again after reconnecting if the retry
   * strategy allows it, ahead of anything queued meanwhile. A reservation
   * holder's batches never are: the connection state they relied on is gone.
   */
  private recoverInFlight(cause: Error): void {
    const resubmitted: PendingRequest[] = [];

    for (const request of this.inFlight.splice(0)) {
      request.retries += 1;
      if (
        request.owner === null &&
        this.config.retryStrategy.retryDelay(request.retries) !== null
      ) {
        resubmitted.push(request);
      } else {
        request.reply.reject(new ConnectionFaultError(this.address, cause));
      }
    }
    this.queue.unshift(...resubmitted);

    if (this.reservedBy !== null) {
      const holder = this.reservedBy;
      this.brokenReservation = holder;
      for (let i = this.queue.length - 1; i >= 0; i--) {
        if (this.queue[i].owner === holder) {
          const [request] = this.queue.splice(i, 1);
          request.reply.reject(this.reservationLost());
        }
      }
    }
  }

  private scheduleReconnect(cause: Error): void {
    this.reconnectAttempts += 1;
    const delay = this.config.reconnectionStrategy.retryDelay(this.reconnectAttempts);

    if (delay === null) {
      this.logger.error(
        `Giving up on ${this.describe()} after ${this.reconnectAttempts - 1} reconnection attempts`,
      );
      this.terminate(new ConnectionFaultError(this.address, cause));
      return;
    }

    this.state = 'connecting';
    this.logger.warn(
      `Reconnecting to ${this.describe()} in ${delay}ms (attempt ${this.reconnectAttempts})`,
    );
    const generation = this.generation;
    this.reconnectTimer = setTimeout(() => this.tell({ type: 'reconnect', generation }), delay);
  }

  private handleClose(done: Deferred<void>): void {
    if (this.state === 'closing' || this.state === 'closed') {
      done.resolve();
      return;
    }
    const driver = this.driver;
    this.driver = null;
    this.generation += 1;
    this.state = 'closing';
    this.terminate(new ClientStoppedError(this.address));

    if (!driver) {
      done.resolve();
      return;
    }
    void driver.disconnect().then(
      () => done.resolve(),
      (error: unknown) => {
        this.logger.warn(
          `Failed to disconnect from ${this.describe()}: ${error instanceof Error ? error.message : error}`,
        );
        done.resolve();
      },
    );
  }

  private terminate(failure: Error): void {
    this.state = 'closed';
    this.failure = failure;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = null;
    }

    for (const request of [...this.inFlight.splice(0), ...this.queue.splice(0)]) {
      request.reply.reject(failure);
    }
    this.reservedBy = null;
    this.brokenReservation = null;
    this.ready.reject(failure);

    const listeners = [...this.terminationListeners];
    this.terminationListeners.clear();
    for (const listener of listeners) {
      listener(failure);
    }
    this.logger.log(`Connection unit for ${this.describe()} closed`);
  }

  private discardDriver(): void {
    const driver = this.driver;
    this.driver = null;
    if (!driver) {
      return;
    }
    driver.disconnect().catch((error: unknown) => {
      this.logger.warn(
        `Failed to disconnect from ${this.describe()}: ${error instanceof Error ? error.message : error}`,
      );
    });
  }

  private reservationLost(): ConnectionFaultError {
    return new ConnectionFaultError(
      this.address,
      new Error('connection was lost while reserved'),
    );
  }

  private describe(): string {
    return formatNodeAddress(this.address);
  }
}
