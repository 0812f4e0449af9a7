/**
 * Redis Store
 * KeyValueStore backed by an ioredis client.
 * Every client failure is surfaced as StoreUnavailableError; nothing is retried here.
 */

import type { Redis } from 'ioredis';
import { KeyValueStore, StoredValue } from './store.types';
import { StoreUnavailableError, errorMessage } from './store.errors';

export class RedisStore implements KeyValueStore {
  private readonly client: Redis;

  constructor(client: Redis) {
    this.client = client;
  }

  async set(key: string, value: StoredValue): Promise<void> {
    await this.run('set', key, () => this.client.set(key, value));
  }

  async get(key: string): Promise<Buffer | null> {
    return this.run('get', key, () => this.client.getBuffer(key));
  }

  async increment(key: string): Promise<number> {
    return this.run('increment', key, () => this.client.incr(key));
  }

  async appendToList(key: string, value: StoredValue): Promise<number> {
    return this.run('appendToList', key, () => this.client.rpush(key, value));
  }

  async readListRange(key: string, start: number, end: number): Promise<string[]> {
    return this.run('readListRange', key, () => this.client.lrange(key, start, end));
  }

  async setWithExpiry(key: string, value: StoredValue, ttlSeconds: number): Promise<void> {
    // SETEX sets value and expiry atomically
    await this.run('setWithExpiry', key, () => this.client.setex(key, ttlSeconds, value));
  }

  async flush(): Promise<void> {
    await this.run('flush', '*', () => this.client.flushdb());
  }

  async close(): Promise<void> {
    await this.run('close', '*', () => this.client.quit());
  }

  private async run<T>(operation: string, key: string, command: () => Promise<T>): Promise<T> {
    try {
      return await command();
    } catch (error) {
      console.error(`Redis ${operation} error for key ${key}:`, errorMessage(error));
      throw new StoreUnavailableError(`Store ${operation} failed for ${key}: ${errorMessage(error)}`, error);
    }
  }
}
