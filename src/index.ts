import 'reflect-metadata';

export * from './common/constants/cluster.constants';
export * from './common/errors/redis.errors';
export * from './common/interfaces/connection-driver.interface';
export * from './common/interfaces/debug-listener.interface';
export * from './common/interfaces/redis-executor.interface';
export * from './common/types/node-address';
export * from './config/client-config';
export * from './config/retry-strategy';
export type { RedisMode, RedisRuntimeConfig } from './config/configuration';
export * from './protocol/raw-command';
export * from './protocol/reply';
export * from './protocol/batch';
export * from './protocol/operation';
export * from './protocol/commands';
export * from './protocol/parsers/cluster-slots.parser';
export * from './connection/connection-unit';
export * from './connection/logging-debug-listener';
export * from './operation/operation-interpreter';
export * from './cluster/cluster-state';
export * from './cluster/cluster-topology-monitor';
export * from './cluster/slot-mapping';
export * from './client/connection.client';
export * from './client/node.client';
export * from './client/cluster.client';
export * from './driver/adapters/valkey.driver';
export * from './driver/factory/valkey-driver.factory';
export * from './redis/redis-client.factory';
export * from './redis/redis.module';
