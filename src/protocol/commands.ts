import { Batch, batch } from './batch';
import { CommandArg, Level, RedisKey, rawCommand } from './raw-command';
import {
  decodeInteger,
  decodeNullableBulk,
  decodeOk,
  decodeSimpleString,
} from './reply';
import { ClusterSlotsParser, SlotRangeMapping } from './parsers/cluster-slots.parser';

export function ping(): Batch<string> {
  return batch(rawCommand(Level.Cluster, ['PING']), decodeSimpleString);
}

export function get(key: RedisKey): Batch<string | null> {
  return batch(rawCommand(Level.Cluster, ['GET', key], key), decodeNullableBulk);
}

export function set(key: RedisKey, value: CommandArg): Batch<'OK'> {
  return batch(rawCommand(Level.Cluster, ['SET', key, value], key), decodeOk);
}

export function incr(key: RedisKey): Batch<number> {
  return batch(rawCommand(Level.Cluster, ['INCR', key], key), decodeInteger);
}

/**
 * Single-key DEL: a multi-key DEL may span slots.
 */
export function del(key: RedisKey): Batch<number> {
  return batch(rawCommand(Level.Cluster, ['DEL', key], key), decodeInteger);
}

export function watch(...keys: RedisKey[]): Batch<'OK'> {
  return batch(rawCommand(Level.Connection, ['WATCH', ...keys], keys[0]), decodeOk);
}

export function unwatch(): Batch<'OK'> {
  return batch(rawCommand(Level.Connection, ['UNWATCH']), decodeOk);
}

export function auth(password: string, username?: string): Batch<'OK'> {
  const args = username ? ['AUTH', username, password] : ['AUTH', password];
  return batch(rawCommand(Level.Connection, args), decodeOk);
}

export function select(db: number): Batch<'OK'> {
  return batch(rawCommand(Level.Connection, ['SELECT', db]), decodeOk);
}

export function clientSetName(name: string): Batch<'OK'> {
  return batch(rawCommand(Level.Connection, ['CLIENT', 'SETNAME', name]), decodeOk);
}

/**
 * Only affects the command right after it, so it must share a batch with that command.
 */
export function asking(): Batch<'OK'> {
  return batch(rawCommand(Level.Node, ['ASKING']), decodeOk);
}

export function clusterSlots(): Batch<SlotRangeMapping[]> {
  return batch(rawCommand(Level.Node, ['CLUSTER', 'SLOTS']), ClusterSlotsParser.parse);
}
