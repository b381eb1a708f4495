import { formatCard, formatEvent, parseBxsearchArgs } from './cli.js';
import { normalizeSearchRequest } from './scraper/search-request.js';

describe('parseBxsearchArgs', () => {
  it('maps flags onto a search request', async () => {
    const request = parseBxsearchArgs([
      '--kw', '智能',
      '--kw', '机房,弱电',
      '--bid-type', '中标公告',
      '--start', '2024-01-01',
      '--end', '2024-01-31',
      '--max-pages', '2',
    ]);

    expect(await normalizeSearchRequest(request, { maxPages: 3 })).toEqual({
      keywords: ['智能', '机房', '弱电'],
      searchMode: 'fulltext',
      pinMu: 'all',
      bidSort: 'all',
      bidType: 7,
      timeWindow: { kind: 'range', start: '2024-01-01', end: '2024-01-31' },
      maxPages: 2,
    });
  });

  it('rejects unknown flags', () => {
    expect(() => parseBxsearchArgs(['--keyword', '智能'])).toThrow();
  });
});

describe('output', () => {
  it('formats crawl events', () => {
    expect(formatEvent({ type: 'keyword_done', keyword: '智能', outcome: 'throttled', pages: 2, stubs: 30, error: null }))
      .toBe('[智能] throttled after 2 page(s), 30 result(s)');
    expect(formatEvent({ type: 'stub', keyword: '智能', pageIndex: 1, stub: {
      title: 't', url: 'u', publishDate: '', buyerName: '', agentName: '',
    } })).toBeNull();
  });

  it('formats a card', () => {
    expect(formatCard({
      id: 7,
      company: '浙江警察学院',
      contactName: '张三',
      phones: ['13812345678', '0571-88888888'],
      emails: [],
      announcementCount: 2,
      createdAt: '2024-03-05T00:00:00.000Z',
      updatedAt: '2024-04-01T00:00:00.000Z',
    })).toBe([
      '#7 浙江警察学院 / 张三',
      '    phones: 13812345678, 0571-88888888',
      '    emails: -',
      '    announcements: 2, updated 2024-04-01T00:00:00.000Z',
    ].join('\n'));
  });
});
