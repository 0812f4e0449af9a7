/**
 * Store Module
 * Store protocol, Redis and in-memory drivers, and the handle factory
 */

import { env, StoreDriver } from '../../config/env';
import { MemoryStore } from './memory.store';
import { RedisConnection, RedisConnectionConfig } from './redis.connection';
import { RedisStore } from './redis.store';
import { StoreHandle } from './store.types';

export * from './store.types';
export * from './store.errors';
export { MemoryStore, encodeValue } from './memory.store';
export { RedisStore } from './redis.store';
export { RedisConnection } from './redis.connection';
export type { RedisConnectionConfig } from './redis.connection';

export interface CreateStoreOptions {
  driver?: StoreDriver;
  redis?: RedisConnectionConfig;
}

/**
 * Open a store for the configured driver
 */
export function createKeyValueStore(options: CreateStoreOptions = {}): StoreHandle {
  const driver = options.driver ?? env.STORE_DRIVER;

  if (driver === 'memory') {
    console.warn('Store: using in-memory driver, values are lost on exit');
    const store = new MemoryStore();
    return { store, shutdown: () => store.close() };
  }

  const connection = new RedisConnection(options.redis);
  const store = new RedisStore(connection.connect());
  return { store, shutdown: () => connection.disconnect() };
}
