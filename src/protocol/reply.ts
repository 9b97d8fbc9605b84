import { ErrorReplyError, UnexpectedReplyError } from '../common/errors/redis.errors';

/**
 * Error reply kept as a value. It only becomes a thrown error once a decoder
 * reaches it, so one failing command does not fail its whole batch.
 */
export class ErrorReply {
  constructor(readonly message: string) {}

  toError(): ErrorReplyError {
    return new ErrorReplyError(this.message);
  }
}

export type RawReply = string | number | Buffer | null | ErrorReply | RawReply[];

/**
 * Narrows a value produced by the driver's parser into a `RawReply`.
 * Error objects nested in arrays (e.g. inside an `EXEC` reply) become `ErrorReply`.
 */
export function toRawReply(value: unknown): RawReply {
  if (value === null || value === undefined) {
    return null;
  }
  if (typeof value === 'string' || typeof value === 'number' || Buffer.isBuffer(value)) {
    return value;
  }
  if (value instanceof ErrorReply) {
    return value;
  }
  if (value instanceof Error) {
    return new ErrorReply(value.message);
  }
  if (Array.isArray(value)) {
    return value.map((item: unknown) => toRawReply(item));
  }
  throw new UnexpectedReplyError('a RESP value', value);
}

function unwrap(reply: RawReply | undefined): RawReply {
  if (reply === undefined) {
    throw new UnexpectedReplyError('a reply', reply);
  }
  if (reply instanceof ErrorReply) {
    throw reply.toError();
  }
  return reply;
}

export function decodeSimpleString(reply: RawReply | undefined): string {
  const value = unwrap(reply);
  if (typeof value !== 'string') {
    throw new UnexpectedReplyError('a simple string', value);
  }
  return value;
}

export function decodeOk(reply: RawReply | undefined): 'OK' {
  const value = decodeSimpleString(reply);
  if (value !== 'OK') {
    throw new UnexpectedReplyError('OK', value);
  }
  return value;
}

export function decodeInteger(reply: RawReply | undefined): number {
  const value = unwrap(reply);
  if (typeof value !== 'number') {
    throw new UnexpectedReplyError('an integer', value);
  }
  return value;
}

export function decodeNullableBulk(reply: RawReply | undefined): string | null {
  const value = unwrap(reply);
  if (value === null) {
    return null;
  }
  if (Buffer.isBuffer(value)) {
    return value.toString('utf8');
  }
  if (typeof value !== 'string') {
    throw new UnexpectedReplyError('a bulk string', value);
  }
  return value;
}

export function decodeArray(reply: RawReply | undefined): RawReply[] {
  const value = unwrap(reply);
  if (!Array.isArray(value)) {
    throw new UnexpectedReplyError('an array', value);
  }
  return value;
}

/**
 * Target of a `-MOVED <slot> <host:port>` or `-ASK <slot> <host:port>` reply.
 */
export interface Redirection {
  kind: 'MOVED' | 'ASK';
  slot: number;
  address: string;
}

export function parseRedirection(reply: RawReply | undefined): Redirection | null {
  if (!(reply instanceof ErrorReply)) {
    return null;
  }
  const [kind, slot, address] = reply.message.split(' ');
  if ((kind !== 'MOVED' && kind !== 'ASK') || slot === undefined || address === undefined) {
    return null;
  }
  return { kind, slot: parseInt(slot, 10), address };
}
