import { NodeAddress, parseNodeAddress } from '../common/types/node-address';

export type RedisMode = 'connection' | 'node' | 'cluster';

export interface RedisRuntimeConfig {
  mode: RedisMode;
  nodes: NodeAddress[];
  poolSize: number;
  password?: string;
  username?: string;
  db?: number;
  clientName?: string;
  reconnectInitialDelayMs: number;
  reconnectMaxDelayMs: number;
  commandRetries: number;
  cluster: {
    refreshIntervalMs: number;
    minRefreshIntervalMs: number;
    nodesToQuery: number;
    clientCloseDelayMs: number;
    maxRedirections: number;
  };
  debugTraffic: boolean;
}

export interface AppConfig {
  redis: RedisRuntimeConfig;
}

function parseMode(value: string | undefined): RedisMode {
  switch (value || 'node') {
    case 'connection':
      return 'connection';
    case 'node':
      return 'node';
    case 'cluster':
      return 'cluster';
    default:
      throw new Error(`Invalid REDIS_MODE: ${value}`);
  }
}

function optionalInt(value: string | undefined): number | undefined {
  return value ? parseInt(value, 10) : undefined;
}

export default (): AppConfig => ({
  redis: {
    mode: parseMode(process.env.REDIS_MODE),
    nodes: (process.env.REDIS_NODES || '127.0.0.1:6379')
      .split(',')
      .filter((node) => node.trim().length > 0)
      .map((node) => parseNodeAddress(node)),
    poolSize: parseInt(process.env.REDIS_POOL_SIZE || '4', 10),
    password: process.env.REDIS_PASSWORD || undefined,
    username: process.env.REDIS_USERNAME || undefined,
    db: optionalInt(process.env.REDIS_DB),
    clientName: process.env.REDIS_CLIENT_NAME || undefined,
    reconnectInitialDelayMs: parseInt(process.env.REDIS_RECONNECT_INITIAL_DELAY_MS || '100', 10),
    reconnectMaxDelayMs: parseInt(process.env.REDIS_RECONNECT_MAX_DELAY_MS || '10000', 10),
    commandRetries: parseInt(process.env.REDIS_COMMAND_RETRIES || '3', 10),
    cluster: {
      refreshIntervalMs: parseInt(process.env.REDIS_CLUSTER_REFRESH_INTERVAL_MS || '15000', 10),
      minRefreshIntervalMs: parseInt(process.env.REDIS_CLUSTER_MIN_REFRESH_INTERVAL_MS || '1000', 10),
      nodesToQuery: parseInt(process.env.REDIS_CLUSTER_NODES_TO_QUERY || '3', 10),
      clientCloseDelayMs: parseInt(process.env.REDIS_CLUSTER_CLIENT_CLOSE_DELAY_MS || '1000', 10),
      maxRedirections: parseInt(process.env.REDIS_CLUSTER_MAX_REDIRECTIONS || '3', 10),
    },
    debugTraffic: process.env.REDIS_DEBUG_TRAFFIC === 'true',
  },
});
