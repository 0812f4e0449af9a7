/**
 * redis-call-cache
 *
 * Instrumented value store with call-history replay,
 * and an expiring page cache with access counting, over Redis.
 */

export * from './lib/store';
export * from './lib/instrumentation';
export * from './lib/value-store';
export * from './lib/fetch';
export { env } from './config/env';
