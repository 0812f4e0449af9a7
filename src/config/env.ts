import dotenv from 'dotenv';

dotenv.config();

export const env = {
  NODE_ENV: process.env.NODE_ENV || 'development',

  // Store
  STORE_DRIVER: process.env.STORE_DRIVER === 'memory' ? 'memory' : 'redis',
  REDIS_URL: process.env.REDIS_URL || 'redis://localhost:6379',
  REDIS_PASSWORD: process.env.REDIS_PASSWORD || undefined,
  REDIS_DB: parseInt(process.env.REDIS_DB || '0', 10),
  REDIS_MAX_RETRIES_PER_REQUEST: parseInt(process.env.REDIS_MAX_RETRIES_PER_REQUEST || '3', 10),

  // Instrumentation
  STORE_OPERATION_NAME: process.env.STORE_OPERATION_NAME || 'store',
  FLUSH_ON_INIT: process.env.FLUSH_ON_INIT === 'true', // Default false

  // Page cache
  FETCH_CACHE_TTL: parseInt(process.env.FETCH_CACHE_TTL || '10', 10), // seconds
  FETCH_TIMEOUT: parseInt(process.env.FETCH_TIMEOUT || '5000', 10), // 5s for remote fetches
  USER_AGENT: process.env.USER_AGENT || 'Mozilla/5.0 (compatible; RedisCallCache/1.0)',
} as const;

export type StoreDriver = typeof env.STORE_DRIVER;

export default env;
