import calculateSlot from 'cluster-key-slot';
import { RequiredLevelViolationError } from '../common/errors/redis.errors';

export type CommandArg = string | number | Buffer;
export type RedisKey = string | Buffer;

/**
 * Narrowest client surface a command may run on. A command of level `L`
 * runs on a surface requiring `C` only when `L >= C`.
 */
export enum Level {
  /** Changes connection state (WATCH, SELECT, AUTH); single-connection client only. */
  Connection = 0,
  /** Concerns one node as a whole (CLUSTER SLOTS); not routable by key. */
  Node = 1,
  /** Safe on any surface, routed by key in a cluster. */
  Cluster = 2,
}

export interface RawCommand {
  readonly args: readonly CommandArg[];
  readonly level: Level;
  /** First key of the command, the one it is routed by. */
  readonly key?: RedisKey;
}

export function rawCommand(level: Level, args: readonly CommandArg[], key?: RedisKey): RawCommand {
  return key === undefined ? { args, level } : { args, level, key };
}

export function commandName(command: RawCommand): string {
  const [name] = command.args;
  return name === undefined ? '<empty>' : String(name).toUpperCase();
}

export function requireLevel(
  commands: readonly RawCommand[],
  level: Level,
  clientName: string,
): void {
  const violating = commands.find((command) => command.level < level);
  if (violating) {
    throw new RequiredLevelViolationError(commandName(violating), clientName);
  }
}

export function keySlot(command: RawCommand): number | undefined {
  return command.key === undefined ? undefined : calculateSlot(command.key);
}

/**
 * Size of the commands once encoded as RESP arrays of bulk strings.
 */
export function encodedSize(commands: readonly RawCommand[]): number {
  let size = 0;
  for (const { args } of commands) {
    size += `*${args.length}\r\n`.length;
    for (const arg of args) {
      const length = Buffer.isBuffer(arg) ? arg.length : Buffer.byteLength(String(arg));
      size += `$${length}\r\n`.length + length + 2;
    }
  }
  return size;
}
