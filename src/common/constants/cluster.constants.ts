/**
 * Redis/Valkey Cluster Constants
 *
 * These are architectural constants defined by the Redis/Valkey Cluster specification.
 */

/**
 * Total number of hash slots in a Redis/Valkey cluster.
 *
 * Every key in a cluster is mapped to one of these 16,384 slots using CRC16(key) mod 16384.
 *
 * @see https://valkey.io/topics/cluster-spec/
 */
export const CLUSTER_TOTAL_SLOTS = 16384;

export const DEFAULT_REDIS_HOST = '127.0.0.1';
export const DEFAULT_REDIS_PORT = 6379;

export const DEFAULT_COMMAND_TIMEOUT_MS = 10_000;
