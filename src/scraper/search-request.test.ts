import { SearchParamsError } from '../types/errors.js';
import { normalizeSearchRequest, resolveBidType, resolveTimeWindow, toSearchRequest } from './search-request.js';

const DEFAULTS = { maxPages: 3 };

describe('normalizeSearchRequest', () => {
  it('fills defaults', async () => {
    expect(await normalizeSearchRequest({ keywords: ['智能'] }, DEFAULTS)).toEqual({
      keywords: ['智能'],
      searchMode: 'fulltext',
      pinMu: 'all',
      bidSort: 'all',
      bidType: 0,
      timeWindow: { kind: 'preset', preset: '1week' },
      maxPages: 3,
    });
  });

  it('resolves names, dates and string numbers', async () => {
    const filters = await normalizeSearchRequest({
      keywords: '智能，弱电',
      searchMode: 'title',
      bidType: '中标公告',
      startDate: '2024:1:5',
      endDate: '2024-02-01',
      maxPages: '5',
    }, DEFAULTS);

    expect(filters.keywords).toEqual(['智能', '弱电']);
    expect(filters.searchMode).toBe('title');
    expect(filters.bidType).toBe(7);
    expect(filters.timeWindow).toEqual({ kind: 'range', start: '2024-01-05', end: '2024-02-01' });
    expect(filters.maxPages).toBe(5);
  });

  it('requires a keyword', async () => {
    await expect(normalizeSearchRequest({ keywords: ' , ' }, DEFAULTS)).rejects.toThrow('At least one keyword is required');
  });

  it('rejects unknown filter values before anything runs', async () => {
    await expect(normalizeSearchRequest({ keywords: '智能', pinMu: 'food' }, DEFAULTS)).rejects.toThrow(SearchParamsError);
    await expect(normalizeSearchRequest({ keywords: '智能', maxPages: 0 }, DEFAULTS)).rejects.toThrow(SearchParamsError);
  });

  it('round-trips through toSearchRequest', async () => {
    const filters = await normalizeSearchRequest(
      { keywords: ['智能'], timePreset: '1month', bidType: 2, maxPages: 4 },
      DEFAULTS
    );
    expect(await normalizeSearchRequest(toSearchRequest(filters), DEFAULTS)).toEqual(filters);
  });
});

describe('resolveBidType', () => {
  it('accepts codes and names', () => {
    expect(resolveBidType(11)).toBe(11);
    expect(resolveBidType(' 4 ')).toBe(4);
    expect(resolveBidType('竞争性磋商')).toBe(10);
  });

  it('rejects anything else', () => {
    expect(() => resolveBidType(13)).toThrow(SearchParamsError);
    expect(() => resolveBidType('toString')).toThrow(SearchParamsError);
  });
});

describe('resolveTimeWindow', () => {
  it('needs both ends of a custom range', () => {
    expect(() => resolveTimeWindow({ startDate: '2024-01-01' })).toThrow(SearchParamsError);
  });

  it('rejects a reversed range', () => {
    expect(() => resolveTimeWindow({ startDate: '2024-03-01', endDate: '2024-02-01' })).toThrow(
      'startDate 2024-03-01 is after endDate 2024-02-01'
    );
  });

  it('uses the preset when no dates are given', () => {
    expect(resolveTimeWindow({ timePreset: 'today' })).toEqual({ kind: 'preset', preset: 'today' });
  });
});
