import { NoSlotOwnerError, RedisClientError } from '../common/errors/redis.errors';
import type { RedisNodeClient } from '../client/node.client';
import { SlotMappingEntry, findSlotEntry } from './slot-mapping';

/**
 * Immutable snapshot of the slot mapping, replaced as a whole on every change.
 */
export class ClusterState {
  constructor(readonly mapping: readonly SlotMappingEntry<RedisNodeClient>[]) {}

  get empty(): boolean {
    return this.mapping.length === 0;
  }

  clientForSlot(slot: number): RedisNodeClient {
    const entry = findSlotEntry(this.mapping, slot);
    if (!entry) {
      throw new NoSlotOwnerError(slot);
    }
    return entry.client;
  }

  /** Target of commands without a key. */
  anyClient(): RedisNodeClient {
    const [entry] = this.mapping;
    if (!entry) {
      throw new RedisClientError('Cluster slot mapping is empty');
    }
    return entry.client;
  }
}
