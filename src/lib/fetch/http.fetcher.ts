/**
 * HTTP Page Fetcher
 * Uses native fetch with an abort timeout
 */

import { env } from '../../config/env';
import { classifyFetchError, classifyStatus } from './fetch.errors';

export type PageFetcher = (url: string) => Promise<string>;

export interface FetchPageOptions {
  timeout?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

/**
 * Fetch a page's body as text. Any failure is thrown as a FetchError.
 */
export async function fetchPage(url: string, options: FetchPageOptions = {}): Promise<string> {
  const timeout = options.timeout ?? env.FETCH_TIMEOUT;
  const controller = new AbortController();
  const timeoutId = setTimeout(() => controller.abort(), timeout);

  try {
    const response = await fetch(url, {
      method: 'GET',
      headers: {
        'User-Agent': options.userAgent ?? env.USER_AGENT,
        'Accept': 'text/html, */*',
        ...options.headers,
      },
      redirect: 'follow',
      signal: controller.signal,
    });

    if (!response.ok) {
      throw classifyStatus(url, response.status);
    }

    return await response.text();
  } catch (error) {
    throw classifyFetchError(url, error);
  } finally {
    clearTimeout(timeoutId);
  }
}

export function createPageFetcher(options: FetchPageOptions = {}): PageFetcher {
  return (url: string) => fetchPage(url, options);
}
