/**
 * CCGP bxsearch Scraper
 * Pages through https://search.ccgp.gov.cn/bxsearch result lists and yields announcement stubs.
 * The portal answers too many requests with a "访问过于频繁，请稍后再试" page.
 */

import * as cheerio from 'cheerio';
import type { DelayRange } from '../config/settings.js';
import type {
  AnnouncementStub,
  BidSort,
  KeywordOutcome,
  KeywordQuery,
  PinMu,
  SearchFilters,
  SearchMode,
  TimePreset,
} from '../types/index.js';
import { errorMessage, isTransientFetchError } from '../types/errors.js';
import { cleanDate, cleanTitle, cleanUrl } from '../extractor/cleaner.js';
import { randomBetween, retryFetch, sleep, type PageFetcher, type RetryOptions } from './fetcher.js';

export const BXSEARCH_URL = 'https://search.ccgp.gov.cn/bxsearch';
export const THROTTLE_MARKERS = ['访问过于频繁', '稍后再试'];

const RESULT_ITEM_SELECTOR = 'ul.vT-srch-result-list-bid > li';

const SEARCH_TYPE: Record<SearchMode, number> = { title: 1, fulltext: 2 };
const PIN_MU: Record<PinMu, number> = { all: 0, goods: 1, engineering: 2, services: 3 };
const BID_SORT: Record<BidSort, number> = { all: 0, central: 1, local: 2 };
const TIME_TYPE: Record<TimePreset, number> = {
  today: 0,
  '3days': 1,
  '1week': 2,
  '1month': 3,
  '3months': 4,
  halfyear: 5,
};
const CUSTOM_TIME_TYPE = 6;

export type SearchEvent =
  | { type: 'keyword_start'; keyword: string }
  | { type: 'page'; keyword: string; pageIndex: number; url: string; rows: number; throttled: boolean }
  | { type: 'stub'; keyword: string; pageIndex: number; stub: AnnouncementStub }
  | {
      type: 'keyword_done';
      keyword: string;
      outcome: KeywordOutcome;
      pages: number;
      stubs: number;
      error: string | null;
    };

export interface SearchDeps {
  fetcher: PageFetcher;
  retry: RetryOptions;
  pageDelay: DelayRange;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

/** YYYY-MM-DD -> YYYY:MM:DD, the form the portal expects */
function toColonDate(date: string): string {
  return date.replace(/-/g, ':');
}

/**
 * Result list URL for one keyword and page. Colons in dates stay unencoded.
 */
export function buildSearchUrl(query: KeywordQuery, pageIndex: number): string {
  const timeWindow = query.timeWindow;
  const params: [string, string][] = [
    ['searchtype', String(SEARCH_TYPE[query.searchMode])],
    ['page_index', String(pageIndex)],
    ['start_time', timeWindow.kind === 'range' ? toColonDate(timeWindow.start) : ''],
    ['end_time', timeWindow.kind === 'range' ? toColonDate(timeWindow.end) : ''],
    ['timeType', String(timeWindow.kind === 'range' ? CUSTOM_TIME_TYPE : TIME_TYPE[timeWindow.preset])],
    ['searchparam', ''],
    ['searchchannel', '0'],
    ['dbselect', 'bidx'],
    ['kw', query.keyword],
    ['bidSort', String(BID_SORT[query.bidSort])],
    ['pinMu', String(PIN_MU[query.pinMu])],
    ['bidType', String(query.bidType)],
    ['buyerName', ''],
    ['projectId', ''],
    ['displayZone', ''],
    ['zoneId', ''],
    ['agentName', ''],
    ['pppStatus', '0'],
  ];

  const search = params
    .map(([key, value]) => `${key}=${encodeURIComponent(value).replace(/%3A/gi, ':')}`)
    .join('&');
  return `${BXSEARCH_URL}?${search}`;
}

/**
 * Position of the earliest throttle marker, or -1
 */
export function detectThrottle(html: string): number {
  const positions = THROTTLE_MARKERS.map(marker => html.indexOf(marker)).filter(i => i !== -1);
  return positions.length > 0 ? Math.min(...positions) : -1;
}

/**
 * The part of a throttled page that holds complete result rows
 */
export function htmlBeforeThrottle(html: string, markerAt: number): string {
  const lastRowEnd = html.lastIndexOf('</li>', markerAt);
  return lastRowEnd === -1 ? '' : html.slice(0, lastRowEnd + '</li>'.length);
}

/**
 * Parse result rows: title link plus "date | 采购人：X | 代理机构：Y" info span
 */
export function parseResultRows(html: string): AnnouncementStub[] {
  if (!html) return [];

  const $ = cheerio.load(html);
  const stubs: AnnouncementStub[] = [];

  $(RESULT_ITEM_SELECTOR).each((_, li) => {
    const link = $(li).find('a[href]').first();
    const title = cleanTitle(link.text());
    const url = cleanUrl(link.attr('href'));
    if (!title || !url) return;

    const info = $(li).find('span').first().text().replace(/\s+/g, ' ').trim();
    const parts = info.split('|').map(part => part.trim()).filter(Boolean);

    let buyerName = '';
    let agentName = '';
    for (const part of parts.slice(1)) {
      if (part.startsWith('采购人：')) buyerName = part.slice('采购人：'.length).trim();
      else if (part.startsWith('代理机构：')) agentName = part.slice('代理机构：'.length).trim();
    }

    stubs.push({
      title,
      url,
      publishDate: cleanDate(parts[0] ?? ''),
      buyerName,
      agentName,
    });
  });

  return stubs;
}

/**
 * Page through one keyword's results.
 * Ends after an empty page (exhausted), a throttle page, the page cap,
 * a list page that still fails after retries, or cancellation.
 */
export async function* searchKeyword(
  query: KeywordQuery,
  maxPages: number,
  deps: SearchDeps
): AsyncGenerator<SearchEvent> {
  const wait = deps.sleep ?? sleep;
  const { keyword } = query;
  let pages = 0;
  let stubs = 0;

  const done = (outcome: KeywordOutcome, error: string | null = null): SearchEvent => ({
    type: 'keyword_done',
    keyword,
    outcome,
    pages,
    stubs,
    error,
  });

  yield { type: 'keyword_start', keyword };

  for (let pageIndex = 1; ; pageIndex++) {
    if (pageIndex > maxPages) {
      yield done('page_cap');
      return;
    }
    if (deps.signal?.aborted) {
      yield done('cancelled');
      return;
    }

    if (pageIndex > 1) {
      await wait(randomBetween(deps.pageDelay, deps.random));
      if (deps.signal?.aborted) {
        yield done('cancelled');
        return;
      }
    }

    const url = buildSearchUrl(query, pageIndex);
    console.log(`Searching bxsearch for "${keyword}", page ${pageIndex}`);

    let html: string;
    try {
      html = await retryFetch(deps.fetcher, url, { ...deps.retry, sleep: deps.sleep ?? deps.retry.sleep });
    } catch (error) {
      if (!isTransientFetchError(error)) throw error;
      console.error(`List page ${pageIndex} for "${keyword}" failed:`, errorMessage(error));
      yield done('failed', errorMessage(error));
      return;
    }
    pages++;

    const markerAt = detectThrottle(html);
    const throttled = markerAt !== -1;
    const rows = parseResultRows(throttled ? htmlBeforeThrottle(html, markerAt) : html);

    yield { type: 'page', keyword, pageIndex, url, rows: rows.length, throttled };

    for (const stub of rows) {
      stubs++;
      yield { type: 'stub', keyword, pageIndex, stub };
    }

    if (throttled) {
      console.warn(`Rate limited while searching "${keyword}" (page ${pageIndex}), moving on`);
      yield done('throttled');
      return;
    }
    if (rows.length === 0) {
      yield done('exhausted');
      return;
    }
  }
}

/**
 * All keywords in order. Stubs are not deduplicated across keywords here.
 */
export async function* searchAnnouncements(
  filters: SearchFilters,
  deps: SearchDeps
): AsyncGenerator<SearchEvent> {
  const { keywords, maxPages, ...facets } = filters;

  for (const keyword of keywords) {
    if (deps.signal?.aborted) return;
    yield* searchKeyword({ ...facets, keyword }, maxPages, deps);
  }
}
