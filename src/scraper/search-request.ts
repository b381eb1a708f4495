/**
 * Search request validation: raw CLI/API/task input -> SearchFilters
 */

import { z } from 'zod';
import {
  BID_SORT_VALUES,
  PIN_MU_VALUES,
  SEARCH_MODES,
  TIME_PRESETS,
  type SearchFilters,
  type TimePreset,
  type TimeWindow,
} from '../types/index.js';
import { SearchParamsError } from '../types/errors.js';
import { loadKeywords } from '../utils/keyword-list.js';

// bidType: 0=所有类型, 1=公开招标, 2=询价公告, 3=竞争性谈判, 4=单一来源, 5=资格预审,
//          6=邀请公告, 7=中标公告, 8=更正公告, 9=其他公告, 10=竞争性磋商, 11=成交公告, 12=终止公告
export const BID_TYPE_NAMES: ReadonlyMap<string, number> = new Map([
  ['all', 0],
  ['所有类型', 0],
  ['公开招标', 1],
  ['询价公告', 2],
  ['竞争性谈判', 3],
  ['单一来源', 4],
  ['资格预审', 5],
  ['邀请公告', 6],
  ['中标公告', 7],
  ['更正公告', 8],
  ['其他公告', 9],
  ['竞争性磋商', 10],
  ['成交公告', 11],
  ['终止公告', 12],
]);

const MAX_BID_TYPE = 12;
const DATE_PATTERN = /^\d{4}[-:]\d{1,2}[-:]\d{1,2}$/;

export const searchRequestSchema = z.object({
  keywords: z.union([z.string(), z.array(z.string())]).optional(),
  keywordFile: z.string().min(1).optional(),
  searchMode: z.enum(SEARCH_MODES).default('fulltext'),
  pinMu: z.enum(PIN_MU_VALUES).default('all'),
  bidSort: z.enum(BID_SORT_VALUES).default('all'),
  bidType: z.union([z.number().int(), z.string()]).default(0),
  timePreset: z.enum(TIME_PRESETS).optional(),
  startDate: z.string().regex(DATE_PATTERN, 'expected YYYY-MM-DD').optional(),
  endDate: z.string().regex(DATE_PATTERN, 'expected YYYY-MM-DD').optional(),
  maxPages: z.coerce.number().int().min(1).max(100).optional(),
});

export type SearchRequest = z.input<typeof searchRequestSchema>;

export function resolveBidType(value: number | string): number {
  if (typeof value === 'number') {
    if (value < 0 || value > MAX_BID_TYPE) throw new SearchParamsError(`Unsupported bidType: ${value}`);
    return value;
  }

  const trimmed = value.trim();
  if (/^\d+$/.test(trimmed)) return resolveBidType(parseInt(trimmed, 10));
  const code = BID_TYPE_NAMES.get(trimmed);
  if (code !== undefined) return code;
  throw new SearchParamsError(`Unsupported bidType: ${value}`);
}

/** "2024:1:5" / "2024-01-05" -> "2024-01-05" */
function normalizeDate(value: string): string {
  const [year, month, day] = value.split(/[-:]/);
  return `${year}-${month.padStart(2, '0')}-${day.padStart(2, '0')}`;
}

export function resolveTimeWindow(input: {
  timePreset?: TimePreset;
  startDate?: string;
  endDate?: string;
}): TimeWindow {
  if (input.startDate || input.endDate) {
    if (!input.startDate || !input.endDate) {
      throw new SearchParamsError('A custom time window needs both startDate and endDate');
    }
    const start = normalizeDate(input.startDate);
    const end = normalizeDate(input.endDate);
    if (start > end) {
      throw new SearchParamsError(`startDate ${start} is after endDate ${end}`);
    }
    return { kind: 'range', start, end };
  }
  return { kind: 'preset', preset: input.timePreset ?? '1week' };
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => (issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message))
    .join('; ');
}

/**
 * Validate a search request and resolve its keywords, bidType and time window.
 * Throws SearchParamsError before anything is fetched.
 */
export async function normalizeSearchRequest(
  input: unknown,
  defaults: { maxPages: number }
): Promise<SearchFilters> {
  const parsed = searchRequestSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw new SearchParamsError(`Invalid search request: ${formatIssues(parsed.error)}`);
  }
  const request = parsed.data;

  const keywords = await loadKeywords({ keywords: request.keywords, keywordFile: request.keywordFile });
  if (keywords.length === 0) {
    throw new SearchParamsError('At least one keyword is required');
  }

  return {
    keywords,
    searchMode: request.searchMode,
    pinMu: request.pinMu,
    bidSort: request.bidSort,
    bidType: resolveBidType(request.bidType),
    timeWindow: resolveTimeWindow(request),
    maxPages: request.maxPages ?? defaults.maxPages,
  };
}

/**
 * Inverse of normalizeSearchRequest, for handing resolved filters to another process
 */
export function toSearchRequest(filters: SearchFilters): SearchRequest {
  const window = filters.timeWindow.kind === 'range'
    ? { startDate: filters.timeWindow.start, endDate: filters.timeWindow.end }
    : { timePreset: filters.timeWindow.preset };

  return {
    keywords: filters.keywords,
    searchMode: filters.searchMode,
    pinMu: filters.pinMu,
    bidSort: filters.bidSort,
    bidType: filters.bidType,
    maxPages: filters.maxPages,
    ...window,
  };
}
