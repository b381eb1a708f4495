/**
 * Page fetching for list and detail pages.
 *
 * Every fetcher resolves to the raw HTML of a URL or rejects with
 * FetchTimeoutError / FetchNetworkError. Retries and backoff live in
 * retryFetch so both fetchers share one policy.
 */

import fetch, { AbortError } from 'node-fetch';
import { DEFAULT_USER_AGENT, type DelayRange } from '../config/settings.js';
import {
  FetchNetworkError,
  FetchTimeoutError,
  errorMessage,
} from '../types/errors.js';

export interface PageFetcher {
  fetch(url: string, timeoutMs: number): Promise<string>;
  close(): Promise<void>;
}

const HEADERS = {
  'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
  'Accept-Language': 'zh-CN,zh;q=0.9,en;q=0.5',
};

/**
 * Sleep helper for rate limiting
 */
export function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

export function randomBetween(range: DelayRange, random: () => number = Math.random): number {
  return Math.round(range.minMs + random() * (range.maxMs - range.minMs));
}

export class HttpPageFetcher implements PageFetcher {
  constructor(private readonly userAgent: string = DEFAULT_USER_AGENT) {}

  async fetch(url: string, timeoutMs: number): Promise<string> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);

    try {
      const response = await fetch(url, {
        headers: { ...HEADERS, 'User-Agent': this.userAgent },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new FetchNetworkError(url, `HTTP ${response.status}: ${response.statusText}`, response.status);
      }
      return await response.text();
    } catch (error) {
      if (error instanceof FetchNetworkError) throw error;
      if (error instanceof AbortError || controller.signal.aborted) {
        throw new FetchTimeoutError(url, timeoutMs);
      }
      throw new FetchNetworkError(url, errorMessage(error));
    } finally {
      clearTimeout(timer);
    }
  }

  async close(): Promise<void> {
    // Nothing pooled
  }
}

/** Timeouts, connection failures, 429 and 5xx are worth another attempt; other statuses are not */
export function isRetryable(error: unknown): boolean {
  if (error instanceof FetchTimeoutError) return true;
  if (error instanceof FetchNetworkError) {
    return error.status === null || error.status === 429 || error.status >= 500;
  }
  return false;
}

export interface RetryOptions {
  timeoutMs: number;
  retries: number;
  delayMs: number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Fetch with exponential backoff.
 * `retries` counts attempts after the first one.
 */
export async function retryFetch(
  fetcher: PageFetcher,
  url: string,
  options: RetryOptions
): Promise<string> {
  const wait = options.sleep ?? sleep;
  const attempts = options.retries + 1;

  for (let attempt = 0; ; attempt++) {
    try {
      return await fetcher.fetch(url, options.timeoutMs);
    } catch (error) {
      if (!isRetryable(error) || attempt >= attempts - 1) {
        throw error;
      }
      console.warn(`Request failed (attempt ${attempt + 1}/${attempts}): ${errorMessage(error)}`);
      await wait(options.delayMs * Math.pow(2, attempt));
    }
  }
}
