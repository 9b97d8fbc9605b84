import { OptimisticLockError, UnexpectedReplyError } from '../common/errors/redis.errors';
import { Level, RawCommand, rawCommand } from './raw-command';
import { ErrorReply, RawReply, decodeOk } from './reply';

/**
 * Commands pipelined together, with one decoder for their replies.
 * `decode` receives exactly one reply per command, in command order.
 */
export interface Batch<A> {
  readonly commands: readonly RawCommand[];
  /** Set on MULTI/EXEC batches, which must stay on one node and one slot. */
  readonly transactional: boolean;
  decode(replies: readonly RawReply[]): A;
}

export function batch<A>(
  command: RawCommand,
  decode: (reply: RawReply | undefined) => A,
): Batch<A> {
  return {
    commands: [command],
    transactional: false,
    decode: (replies) => decode(replies[0]),
  };
}

/**
 * Batch returning its replies undecoded.
 */
export function rawBatch(commands: readonly RawCommand[]): Batch<RawReply[]> {
  return {
    commands,
    transactional: false,
    decode: (replies) => [...replies],
  };
}

export function mapBatch<A, B>(source: Batch<A>, fn: (value: A) => B): Batch<B> {
  return {
    commands: source.commands,
    transactional: source.transactional,
    decode: (replies) => fn(source.decode(replies)),
  };
}

/**
 * Joins batches into one pipelined batch whose result lists theirs in order.
 */
export function sequence<A, B>(a: Batch<A>, b: Batch<B>): Batch<[A, B]>;
export function sequence<A, B, C>(a: Batch<A>, b: Batch<B>, c: Batch<C>): Batch<[A, B, C]>;
export function sequence<A, B, C, D>(
  a: Batch<A>,
  b: Batch<B>,
  c: Batch<C>,
  d: Batch<D>,
): Batch<[A, B, C, D]>;
export function sequence<A>(...batches: Batch<A>[]): Batch<A[]>;
export function sequence(...batches: Batch<unknown>[]): Batch<unknown[]> {
  return {
    commands: batches.flatMap((item) => item.commands),
    transactional: false,
    decode: (replies) => {
      let offset = 0;
      return batches.map((item) => {
        const count = item.commands.length;
        const value = item.decode(replies.slice(offset, offset + count));
        offset += count;
        return value;
      });
    },
  };
}

const MULTI = rawCommand(Level.Cluster, ['MULTI']);
const EXEC = rawCommand(Level.Cluster, ['EXEC']);

/**
 * Wraps the batch in MULTI ... EXEC. The result of EXEC is handed to the
 * inner decoder; a null EXEC means a watched key changed.
 */
export function transaction<A>(inner: Batch<A>): Batch<A> {
  if (inner.transactional) {
    return inner;
  }
  const count = inner.commands.length;

  return {
    commands: [MULTI, ...inner.commands, EXEC],
    transactional: true,
    decode: (replies) => {
      decodeOk(replies[0]);
      const queued = replies.slice(1, count + 1).find((reply) => reply instanceof ErrorReply);
      const exec = replies[count + 1];

      if (queued instanceof ErrorReply) {
        throw queued.toError();
      }
      if (exec instanceof ErrorReply) {
        throw exec.toError();
      }
      if (exec === null) {
        throw new OptimisticLockError();
      }
      if (!Array.isArray(exec) || exec.length !== count) {
        throw new UnexpectedReplyError(`an EXEC array of ${count}`, exec);
      }
      return inner.decode(exec);
    },
  };
}

/**
 * A single command is atomic on its own and is sent unwrapped.
 */
export function atomic<A>(inner: Batch<A>): Batch<A> {
  return inner.commands.length === 1 ? inner : transaction(inner);
}
