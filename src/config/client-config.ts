import { DebugListener } from '../common/interfaces/debug-listener.interface';
import { NodeAddress } from '../common/types/node-address';
import { Batch } from '../protocol/batch';
import { RetryStrategy, exponentialBackoff, maxRetries, immediateRetry } from './retry-strategy';

export interface ConnectionConfig {
  /** Delay before each reconnection attempt after the connection is lost. */
  readonly reconnectionStrategy: RetryStrategy;
  /**
   * Whether a batch left unanswered by a lost connection is sent again once
   * reconnected. Only the `null`/non-`null` outcome is used.
   */
  readonly retryStrategy: RetryStrategy;
  /** Sent on every new physical connection before any queued work. */
  readonly initCommands?: Batch<unknown>;
  /** Name used in log context. */
  readonly actorName?: string;
  readonly debugListener?: DebugListener;
  readonly connectTimeoutMs: number;
}

export interface NodeConfig {
  readonly poolSize: number;
  readonly connectionConfigs: (index: number) => ConnectionConfig;
}

export interface ClusterConfig {
  readonly nodeConfigs: (address: NodeAddress) => NodeConfig;
  readonly monitoringConnectionConfigs: (address: NodeAddress) => ConnectionConfig;
  readonly autoRefreshIntervalMs: number;
  readonly minRefreshIntervalMs: number;
  /** How many of the known masters a refresh queries. */
  readonly nodesToQueryForState: (mastersCount: number) => number;
  /** Grace period before closing the client of a node that stopped being a master. */
  readonly nodeClientCloseDelayMs: number;
  readonly maxRedirections: number;
}

export function connectionConfig(overrides: Partial<ConnectionConfig> = {}): ConnectionConfig {
  return {
    reconnectionStrategy: exponentialBackoff(100, 10_000),
    retryStrategy: maxRetries(immediateRetry(), 3),
    connectTimeoutMs: 10_000,
    ...overrides,
  };
}

export function nodeConfig(overrides: Partial<NodeConfig> = {}): NodeConfig {
  const defaults = connectionConfig();
  return {
    poolSize: 4,
    connectionConfigs: () => defaults,
    ...overrides,
  };
}

export function clusterConfig(overrides: Partial<ClusterConfig> = {}): ClusterConfig {
  const nodeDefaults = nodeConfig();
  const monitoringDefaults = connectionConfig();
  return {
    nodeConfigs: () => nodeDefaults,
    monitoringConnectionConfigs: () => monitoringDefaults,
    autoRefreshIntervalMs: 15_000,
    minRefreshIntervalMs: 1_000,
    nodesToQueryForState: (mastersCount) => Math.min(mastersCount, 3),
    nodeClientCloseDelayMs: 1_000,
    maxRedirections: 3,
    ...overrides,
  };
}
