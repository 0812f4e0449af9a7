/**
 * Expiring Fetch Cache
 * Memoizes fetched page content in the store for a fixed TTL and counts every access per URL.
 *
 * Fetch failures propagate to the caller and are never cached.
 * Expiry is left to the store: an expired entry simply reads as absent.
 */

import { env } from '../../config/env';
import type { KeyValueStore } from '../store';
import { fetchPage, PageFetcher } from './http.fetcher';

export interface ExpiringFetchCacheConfig {
  store: KeyValueStore;
  fetcher?: PageFetcher;
  ttl?: number; // seconds
}

export const CACHE_KEY_PREFIX = 'cache:';
export const COUNT_KEY_PREFIX = 'count:';

export class ExpiringFetchCache {
  private readonly store: KeyValueStore;
  private readonly fetcher: PageFetcher;
  private readonly ttl: number;

  constructor(config: ExpiringFetchCacheConfig) {
    this.store = config.store;
    this.fetcher = config.fetcher ?? ((url: string) => fetchPage(url));
    this.ttl = config.ttl ?? env.FETCH_CACHE_TTL;

    if (!Number.isInteger(this.ttl) || this.ttl <= 0) {
      throw new RangeError(
        `Fetch cache TTL must be a positive whole number of seconds (FETCH_CACHE_TTL), got ${this.ttl}`
      );
    }
  }

  async fetch(url: string): Promise<string> {
    await this.store.increment(countKey(url));

    const cached = await this.store.get(cacheKey(url));
    if (cached !== null) {
      return cached.toString('utf8');
    }

    console.log(`Fetch cache: miss for ${url}`);
    const content = await this.fetcher(url);
    await this.store.setWithExpiry(cacheKey(url), content, this.ttl);
    return content;
  }

  /**
   * Total fetch() calls for a URL, hits and misses alike
   */
  async accessCount(url: string): Promise<number> {
    const raw = await this.store.get(countKey(url));
    return raw ? parseInt(raw.toString('utf8'), 10) : 0;
  }
}

export function cacheKey(url: string): string {
  return `${CACHE_KEY_PREFIX}${url}`;
}

export function countKey(url: string): string {
  return `${COUNT_KEY_PREFIX}${url}`;
}
