import { FakeFetcher, listPage } from '../test-utils/fake-fetcher.js';
import { resultPageHtml } from '../test-utils/fixtures.js';
import { openTempDb, type TempDb } from '../test-utils/temp-db.js';
import { RunInProgressError } from '../types/errors.js';
import type { SearchFilters } from '../types/index.js';
import type { CrawlSettings } from './crawl-run.js';
import { RunManager } from './run-manager.js';

const SETTINGS: CrawlSettings = {
  fetchTimeoutMs: 1000,
  fetchRetries: 0,
  retryDelayMs: 0,
  pageDelay: { minMs: 0, maxMs: 0 },
  detailDelay: { minMs: 0, maxMs: 0 },
  lookbackChars: 80,
};

const FILTERS: SearchFilters = {
  keywords: ['智能'],
  searchMode: 'fulltext',
  pinMu: 'all',
  bidSort: 'all',
  bidType: 0,
  timeWindow: { kind: 'preset', preset: '1week' },
  maxPages: 1,
};

let db: TempDb;

beforeAll(async () => {
  db = await openTempDb();
});

afterAll(async () => {
  await db.cleanup();
});

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('RunManager', () => {
  it('runs one crawl at a time and closes its fetcher', async () => {
    const fetcher = new FakeFetcher().on(listPage('智能', 1), resultPageHtml([]));
    const manager = new RunManager({ createFetcher: () => fetcher, settings: SETTINGS });

    manager.start(FILTERS);
    expect(manager.running).toBe(true);
    expect(() => manager.start(FILTERS)).toThrow(RunInProgressError);

    await manager.waitForIdle();

    const status = manager.status();
    expect(status.running).toBe(false);
    expect(status.error).toBeNull();
    expect(status.summary?.keywords).toEqual([
      { keyword: '智能', outcome: 'exhausted', pages: 1, stubs: 0, error: null },
    ]);
    expect(status.events.map(e => e.type)).toEqual(['keyword_start', 'page', 'keyword_done', 'run_done']);
    expect(fetcher.closed).toBe(true);
  });

  it('keeps only the most recent events', async () => {
    const fetcher = new FakeFetcher().on(listPage('智能', 1), resultPageHtml([]));
    const manager = new RunManager({ createFetcher: () => fetcher, settings: SETTINGS, maxEvents: 2 });

    manager.start(FILTERS);
    await manager.waitForIdle();

    expect(manager.status().events.map(e => e.type)).toEqual(['keyword_done', 'run_done']);
  });

  it('reports a stop request only while running', async () => {
    const fetcher = new FakeFetcher().on(listPage('智能', 1), resultPageHtml([]));
    const manager = new RunManager({ createFetcher: () => fetcher, settings: SETTINGS });

    expect(manager.stop()).toBe(false);

    manager.start(FILTERS);
    expect(manager.stop()).toBe(true);
    await manager.waitForIdle();

    expect(manager.status().summary?.status).toBe('cancelled');
  });
});
