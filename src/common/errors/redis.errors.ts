import { NodeAddress, formatNodeAddress } from '../types/node-address';

export class RedisClientError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Transport-level failure of a connection: refused, reset, closed mid-flight.
 */
export class ConnectionFaultError extends RedisClientError {
  constructor(
    readonly address: NodeAddress,
    cause?: unknown,
  ) {
    super(
      `Connection to ${formatNodeAddress(address)} failed${
        cause instanceof Error ? `: ${cause.message}` : ''
      }`,
      { cause },
    );
  }
}

export class ProtocolError extends RedisClientError {}

export class RedisTimeoutError extends RedisClientError {
  constructor(readonly timeoutMs: number) {
    super(`Redis command timed out after ${timeoutMs}ms`);
  }
}

export class ClientStoppedError extends RedisClientError {
  constructor(readonly address?: NodeAddress) {
    super(
      address ? `Client for ${formatNodeAddress(address)} has been stopped` : 'Client has been stopped',
    );
  }
}

export class RequiredLevelViolationError extends RedisClientError {
  constructor(
    readonly command: string,
    readonly clientName: string,
  ) {
    super(`Command ${command} cannot be executed on ${clientName}`);
  }
}

export class AbortedOperationError extends RedisClientError {
  constructor(reason: string, cause?: unknown) {
    super(`Operation aborted before finishing: ${reason}`, { cause });
  }
}

/**
 * Error reply sent by the server (`-ERR ...`, `-WRONGTYPE ...`, `-MOVED ...`).
 */
export class ErrorReplyError extends RedisClientError {
  constructor(readonly reply: string) {
    super(reply);
  }
}

export class OptimisticLockError extends RedisClientError {
  constructor() {
    super('Transaction was discarded because a watched key was modified');
  }
}

export class UnexpectedReplyError extends RedisClientError {
  constructor(expected: string, actual: unknown) {
    super(`Expected ${expected}, got ${describeReply(actual)}`);
  }
}

export class CrossSlotError extends RedisClientError {
  constructor(slots: number[]) {
    super(`Keys of an atomic batch map to different slots: ${slots.join(', ')}`);
  }
}

export class NoSlotOwnerError extends RedisClientError {
  constructor(readonly slot: number) {
    super(`No cluster node currently owns slot ${slot}`);
  }
}

export class TooManyRedirectionsError extends RedisClientError {
  constructor(readonly redirections: number) {
    super(`Command was redirected more than ${redirections} times`);
  }
}

function describeReply(value: unknown): string {
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return `array of ${value.length}`;
  }
  if (Buffer.isBuffer(value)) {
    return `buffer of ${value.length} bytes`;
  }
  return `${typeof value} ${JSON.stringify(value)}`;
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
