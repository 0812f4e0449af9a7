/**
 * Fetch Module
 */

export { ExpiringFetchCache, cacheKey, countKey, CACHE_KEY_PREFIX, COUNT_KEY_PREFIX } from './expiring-fetch.cache';
export type { ExpiringFetchCacheConfig } from './expiring-fetch.cache';
export { fetchPage, createPageFetcher } from './http.fetcher';
export type { PageFetcher, FetchPageOptions } from './http.fetcher';
export { FetchError, FetchErrorType, classifyFetchError, classifyStatus } from './fetch.errors';
