import { SlotRange } from '../protocol/parsers/cluster-slots.parser';

export interface SlotMappingEntry<C> {
  readonly range: SlotRange;
  readonly client: C;
}

export function sortMapping<C>(entries: readonly SlotMappingEntry<C>[]): SlotMappingEntry<C>[] {
  return [...entries].sort((a, b) => a.range.start - b.range.start);
}

/**
 * Binary search over a mapping sorted by range start.
 */
export function findSlotEntry<C>(
  mapping: readonly SlotMappingEntry<C>[],
  slot: number,
): SlotMappingEntry<C> | undefined {
  let low = 0;
  let high = mapping.length - 1;

  while (low <= high) {
    const middle = (low + high) >>> 1;
    const entry = mapping[middle];
    if (slot < entry.range.start) {
      high = middle - 1;
    } else if (slot > entry.range.end) {
      low = middle + 1;
    } else {
      return entry;
    }
  }
  return undefined;
}

/**
 * Equal ranges in the same order, served by the very same clients.
 */
export function sameMapping<C>(
  a: readonly SlotMappingEntry<C>[],
  b: readonly SlotMappingEntry<C>[],
): boolean {
  return (
    a.length === b.length &&
    a.every(
      (entry, i) =>
        entry.range.start === b[i].range.start &&
        entry.range.end === b[i].range.end &&
        entry.client === b[i].client,
    )
  );
}
