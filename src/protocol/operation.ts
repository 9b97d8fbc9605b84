import { Batch, mapBatch } from './batch';
import { RawCommand } from './raw-command';

export interface LeafOp<A> {
  readonly kind: 'leaf';
  readonly batch: Batch<A>;
}

/**
 * A step whose decoded value is the rest of the operation: the continuation
 * has already been composed into `step.decode`.
 */
export interface FlatMappedOp<A> {
  readonly kind: 'flatMapped';
  readonly step: Batch<RedisOp<A>>;
}

/**
 * Chain of batches where later batches depend on replies to earlier ones,
 * e.g. WATCH, read, then a MULTI/EXEC computed from what was read.
 */
export type RedisOp<A> = LeafOp<A> | FlatMappedOp<A>;

export function leaf<A>(batch: Batch<A>): RedisOp<A> {
  return { kind: 'leaf', batch };
}

export function flatMapped<A, B>(batch: Batch<A>, next: (value: A) => RedisOp<B>): RedisOp<B> {
  return { kind: 'flatMapped', step: mapBatch(batch, next) };
}

export function flatMapOp<A, B>(op: RedisOp<A>, next: (value: A) => RedisOp<B>): RedisOp<B> {
  if (op.kind === 'leaf') {
    return flatMapped(op.batch, next);
  }
  return { kind: 'flatMapped', step: mapBatch(op.step, (rest) => flatMapOp(rest, next)) };
}

export function mapOp<A, B>(op: RedisOp<A>, fn: (value: A) => B): RedisOp<B> {
  if (op.kind === 'leaf') {
    return leaf(mapBatch(op.batch, fn));
  }
  return { kind: 'flatMapped', step: mapBatch(op.step, (rest) => mapOp(rest, fn)) };
}

export function firstCommands(op: RedisOp<unknown>): readonly RawCommand[] {
  return op.kind === 'leaf' ? op.batch.commands : op.step.commands;
}

export class OpSuccess<A> {
  readonly ok = true;

  constructor(readonly value: A) {}

  get(): A {
    return this.value;
  }
}

export class OpFailure {
  readonly ok = false;

  constructor(readonly cause: Error) {}

  get(): never {
    throw this.cause;
  }
}

export type OpResult<A> = OpSuccess<A> | OpFailure;
