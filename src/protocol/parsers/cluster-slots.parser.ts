import { UnexpectedReplyError } from '../../common/errors/redis.errors';
import { NodeAddress, nodeAddress } from '../../common/types/node-address';
import { CLUSTER_TOTAL_SLOTS } from '../../common/constants/cluster.constants';
import { RawReply, decodeArray, decodeInteger, decodeNullableBulk } from '../reply';

export interface SlotRange {
  /** First slot, inclusive. */
  readonly start: number;
  /** Last slot, inclusive. */
  readonly end: number;
}

export interface SlotRangeMapping {
  readonly range: SlotRange;
  readonly master: NodeAddress;
  readonly replicas: NodeAddress[];
}

export class ClusterSlotsParser {
  /**
   * Parses a `CLUSTER SLOTS` reply:
   * `[[start, end, [host, port, id, ...], replica...], ...]`
   */
  static parse(reply: RawReply | undefined): SlotRangeMapping[] {
    return decodeArray(reply).map((entry) => {
      const [start, end, master, ...replicas] = decodeArray(entry);
      const range = ClusterSlotsParser.parseRange(decodeInteger(start), decodeInteger(end));

      return {
        range,
        master: ClusterSlotsParser.parseNode(master),
        replicas: replicas.map((replica) => ClusterSlotsParser.parseNode(replica)),
      };
    });
  }

  static formatRange(range: SlotRange): string {
    return range.start === range.end ? `${range.start}` : `${range.start}-${range.end}`;
  }

  private static parseRange(start: number, end: number): SlotRange {
    if (start < 0 || end < start || end >= CLUSTER_TOTAL_SLOTS) {
      throw new UnexpectedReplyError('a slot range within the cluster keyspace', [start, end]);
    }
    return { start, end };
  }

  private static parseNode(reply: RawReply | undefined): NodeAddress {
    const [host, port] = decodeArray(reply);
    const hostname = decodeNullableBulk(host);

    if (!hostname) {
      throw new UnexpectedReplyError('a node hostname', host ?? null);
    }
    return nodeAddress(hostname, decodeInteger(port));
  }
}
