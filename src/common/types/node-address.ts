import { DEFAULT_REDIS_HOST, DEFAULT_REDIS_PORT } from '../constants/cluster.constants';

export interface NodeAddress {
  readonly host: string;
  readonly port: number;
}

export const DEFAULT_NODE_ADDRESS: NodeAddress = Object.freeze({
  host: DEFAULT_REDIS_HOST,
  port: DEFAULT_REDIS_PORT,
});

export function nodeAddress(host: string, port: number = DEFAULT_REDIS_PORT): NodeAddress {
  return Object.freeze({ host, port });
}

/**
 * Identity of an address, used wherever addresses key a map.
 */
export function formatNodeAddress(address: NodeAddress): string {
  return `${address.host}:${address.port}`;
}

export function sameNodeAddress(a: NodeAddress, b: NodeAddress): boolean {
  return a.host === b.host && a.port === b.port;
}

/**
 * Parses `host:port`. Cluster node listings append the bus port as
 * `host:port@busport`; only the client port is kept.
 */
export function parseNodeAddress(value: string): NodeAddress {
  const [hostPort] = value.trim().split('@');
  const separator = hostPort.lastIndexOf(':');
  if (separator === -1) {
    return nodeAddress(hostPort);
  }

  const host = hostPort.substring(0, separator);
  const port = parseInt(hostPort.substring(separator + 1), 10);

  if (!host || isNaN(port)) {
    throw new Error(`Invalid node address: ${value}`);
  }

  return nodeAddress(host, port);
}
