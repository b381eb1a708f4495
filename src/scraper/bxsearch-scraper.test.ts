import { FetchNetworkError } from '../types/errors.js';
import type { KeywordQuery, SearchFilters } from '../types/index.js';
import { FakeFetcher, listPage, noSleep } from '../test-utils/fake-fetcher.js';
import { THROTTLE_TRAILER, resultPageHtml } from '../test-utils/fixtures.js';
import {
  buildSearchUrl,
  detectThrottle,
  parseResultRows,
  searchAnnouncements,
  searchKeyword,
  type SearchDeps,
  type SearchEvent,
} from './bxsearch-scraper.js';

const QUERY: KeywordQuery = {
  keyword: '智能',
  searchMode: 'fulltext',
  pinMu: 'all',
  bidSort: 'all',
  bidType: 0,
  timeWindow: { kind: 'preset', preset: '1week' },
};

function row(n: number) {
  return { title: `公告${n}`, href: `http://www.ccgp.gov.cn/cggg/${n}.htm`, buyer: '浙江警察学院' };
}

function deps(fetcher: FakeFetcher, extra: Partial<SearchDeps> = {}): SearchDeps {
  return {
    fetcher,
    retry: { timeoutMs: 1000, retries: 1, delayMs: 0 },
    pageDelay: { minMs: 0, maxMs: 0 },
    sleep: noSleep,
    ...extra,
  };
}

async function collect(events: AsyncGenerator<SearchEvent>): Promise<SearchEvent[]> {
  const out: SearchEvent[] = [];
  for await (const event of events) out.push(event);
  return out;
}

function outcomes(events: SearchEvent[]) {
  return events.flatMap(e => (e.type === 'keyword_done' ? [[e.keyword, e.outcome, e.pages, e.stubs]] : []));
}

function stubUrls(events: SearchEvent[]) {
  return events.flatMap(e => (e.type === 'stub' ? [e.stub.url] : []));
}

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
  vi.spyOn(console, 'warn').mockImplementation(() => {});
  vi.spyOn(console, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('buildSearchUrl', () => {
  it('encodes the keyword and a preset window', () => {
    expect(buildSearchUrl(QUERY, 2)).toBe(
      'https://search.ccgp.gov.cn/bxsearch?searchtype=2&page_index=2&start_time=&end_time=&timeType=2' +
      '&searchparam=&searchchannel=0&dbselect=bidx&kw=%E6%99%BA%E8%83%BD&bidSort=0&pinMu=0&bidType=0' +
      '&buyerName=&projectId=&displayZone=&zoneId=&agentName=&pppStatus=0'
    );
  });

  it('keeps colons in a custom date range', () => {
    const url = buildSearchUrl(
      { ...QUERY, searchMode: 'title', bidType: 7, timeWindow: { kind: 'range', start: '2024-01-05', end: '2024-02-01' } },
      1
    );
    expect(url).toContain('searchtype=1&page_index=1&start_time=2024:01:05&end_time=2024:02:01&timeType=6');
    expect(url).toContain('&bidType=7&');
  });
});

describe('parseResultRows', () => {
  it('reads title, url, date and parties', () => {
    const html = resultPageHtml([
      { title: '某学院智能化采购公告', href: '//www.ccgp.gov.cn/cggg/1.htm', buyer: '某学院', agent: '某代理公司' },
    ]);

    expect(parseResultRows(html)).toEqual([
      {
        title: '某学院智能化采购公告',
        url: 'http://www.ccgp.gov.cn/cggg/1.htm',
        publishDate: '2024-03-05 10:30:00',
        buyerName: '某学院',
        agentName: '某代理公司',
      },
    ]);
  });

  it('returns nothing for an empty page', () => {
    expect(parseResultRows(resultPageHtml([]))).toEqual([]);
  });
});

describe('detectThrottle', () => {
  it('finds the earliest marker', () => {
    expect(detectThrottle('abc访问过于频繁')).toBe(3);
    expect(detectThrottle('<li></li>')).toBe(-1);
  });
});

describe('searchKeyword', () => {
  it('pages until an empty page', async () => {
    const fetcher = new FakeFetcher()
      .on(listPage('智能', 1), resultPageHtml([row(1), row(2)]))
      .on(listPage('智能', 2), resultPageHtml([row(3)]))
      .on(listPage('智能', 3), resultPageHtml([]));

    const events = await collect(searchKeyword(QUERY, 5, deps(fetcher)));

    expect(stubUrls(events)).toEqual([row(1).href, row(2).href, row(3).href]);
    expect(outcomes(events)).toEqual([['智能', 'exhausted', 3, 3]]);
  });

  it('stops at the page cap', async () => {
    const fetcher = new FakeFetcher().on(() => true, resultPageHtml([row(1)]));

    const events = await collect(searchKeyword(QUERY, 2, deps(fetcher)));

    expect(fetcher.calls).toHaveLength(2);
    expect(outcomes(events)).toEqual([['智能', 'page_cap', 2, 2]]);
  });

  it('yields rows before a throttle marker and ends the keyword', async () => {
    const fetcher = new FakeFetcher()
      .on(listPage('智能', 1), resultPageHtml([row(1), row(2)], THROTTLE_TRAILER));

    const events = await collect(searchKeyword(QUERY, 5, deps(fetcher)));

    expect(stubUrls(events)).toEqual([row(1).href, row(2).href]);
    expect(events).toContainEqual(expect.objectContaining({ type: 'page', pageIndex: 1, rows: 2, throttled: true }));
    expect(outcomes(events)).toEqual([['智能', 'throttled', 1, 2]]);
    expect(fetcher.calls).toHaveLength(1);
  });

  it('yields nothing when the marker comes before any row', async () => {
    const html = `<html><body>${THROTTLE_TRAILER}<ul class="vT-srch-result-list-bid"></ul></body></html>`;
    const fetcher = new FakeFetcher().on(() => true, html);

    const events = await collect(searchKeyword(QUERY, 5, deps(fetcher)));

    expect(stubUrls(events)).toEqual([]);
    expect(outcomes(events)).toEqual([['智能', 'throttled', 1, 0]]);
  });

  it('moves on to the next keyword after a throttled one', async () => {
    const fetcher = new FakeFetcher()
      .on(listPage('智能', 1), resultPageHtml([row(1)], THROTTLE_TRAILER))
      .on(listPage('弱电', 1), resultPageHtml([row(2)]))
      .on(listPage('弱电', 2), resultPageHtml([]));
    const filters: SearchFilters = { ...QUERY, keywords: ['智能', '弱电'], maxPages: 3 };

    const events = await collect(searchAnnouncements(filters, deps(fetcher)));

    expect(outcomes(events)).toEqual([
      ['智能', 'throttled', 1, 1],
      ['弱电', 'exhausted', 2, 1],
    ]);
    expect(stubUrls(events)).toEqual([row(1).href, row(2).href]);
    expect(fetcher.calls).toHaveLength(3);
  });

  it('ends only the keyword when a list page keeps failing', async () => {
    const fetcher = new FakeFetcher()
      .on(listPage('智能', 1), new FetchNetworkError('list', 'HTTP 503', 503))
      .on(listPage('弱电', 1), resultPageHtml([]));
    const filters: SearchFilters = { ...QUERY, keywords: ['智能', '弱电'], maxPages: 3 };

    const events = await collect(searchAnnouncements(filters, deps(fetcher)));

    expect(outcomes(events)).toEqual([
      ['智能', 'failed', 0, 0],
      ['弱电', 'exhausted', 1, 0],
    ]);
    // one retry for the failing page
    expect(fetcher.calls).toHaveLength(3);
  });

  it('waits a randomized delay before every page after the first', async () => {
    const sleeps: number[] = [];
    const fetcher = new FakeFetcher()
      .on(listPage('智能', 1), resultPageHtml([row(1)]))
      .on(listPage('智能', 2), resultPageHtml([]));

    await collect(searchKeyword(QUERY, 5, deps(fetcher, {
      pageDelay: { minMs: 1000, maxMs: 3000 },
      random: () => 0.5,
      sleep: async ms => { sleeps.push(ms); },
    })));

    expect(sleeps).toEqual([2000]);
  });

  it('stops between pages once cancelled', async () => {
    const controller = new AbortController();
    const fetcher = new FakeFetcher().on(() => true, resultPageHtml([row(1)]));

    const events: SearchEvent[] = [];
    for await (const event of searchKeyword(QUERY, 5, deps(fetcher, { signal: controller.signal }))) {
      events.push(event);
      if (event.type === 'stub') controller.abort();
    }

    expect(fetcher.calls).toHaveLength(1);
    expect(outcomes(events)).toEqual([['智能', 'cancelled', 1, 1]]);
  });
});
