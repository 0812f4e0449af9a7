/**
 * Redis Connection Manager
 * Owns one ioredis client per instance: created on first connect(), torn down by disconnect()
 */

import Redis, { RedisOptions } from 'ioredis';
import { env } from '../../config/env';
import { errorMessage } from './store.errors';

export interface RedisConnectionConfig {
  url?: string;
  password?: string;
  db?: number;
  maxRetriesPerRequest?: number;
}

export class RedisConnection {
  private client: Redis | null = null;
  private readonly config: Required<Omit<RedisConnectionConfig, 'password'>> & { password?: string };

  constructor(config: RedisConnectionConfig = {}) {
    this.config = {
      url: config.url ?? env.REDIS_URL,
      password: config.password ?? env.REDIS_PASSWORD,
      db: config.db ?? env.REDIS_DB,
      maxRetriesPerRequest: config.maxRetriesPerRequest ?? env.REDIS_MAX_RETRIES_PER_REQUEST,
    };
  }

  /**
   * Get the client, creating it on first use
   */
  connect(): Redis {
    if (this.client) {
      return this.client;
    }

    const options: RedisOptions = {
      retryStrategy: (times: number) => {
        const delay = Math.min(times * 50, 2000);
        console.log(`Redis retry attempt ${times}, waiting ${delay}ms`);
        return delay;
      },
      maxRetriesPerRequest: this.config.maxRetriesPerRequest,
      enableReadyCheck: true,
      lazyConnect: false,
      db: this.config.db,
    };

    if (this.config.password) {
      options.password = this.config.password;
    }

    const client = new Redis(this.config.url, options);

    client.on('connect', () => {
      console.log('Redis: Connecting...');
    });

    client.on('ready', () => {
      console.log('Redis: Connected and ready');
    });

    client.on('error', (error: Error) => {
      console.error('Redis error:', error.message);
    });

    client.on('close', () => {
      console.log('Redis: Connection closed');
    });

    client.on('reconnecting', () => {
      console.log('Redis: Reconnecting...');
    });

    this.client = client;
    return client;
  }

  /**
   * Health check - ping Redis server
   */
  async healthCheck(): Promise<boolean> {
    if (!this.client) {
      return false;
    }

    try {
      const result = await this.client.ping();
      return result === 'PONG';
    } catch (error) {
      console.error('Redis health check failed:', errorMessage(error));
      return false;
    }
  }

  /**
   * Check if the client is connected and ready
   */
  isAvailable(): boolean {
    return this.client !== null && this.client.status === 'ready';
  }

  /**
   * Disconnect from Redis
   */
  async disconnect(): Promise<void> {
    if (this.client) {
      const client = this.client;
      this.client = null;
      await client.quit();
    }
  }
}
