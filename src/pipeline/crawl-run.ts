/**
 * One crawl run: search -> dedup -> detail fetch -> extract -> merge.
 *
 * Each announcement is written in its own transaction, so a run that is
 * cancelled or fails part way leaves every committed announcement complete.
 * Fetch and parse failures skip one item; store failures abort the run.
 */

import { loadSettings, type Settings } from '../config/settings.js';
import { initializeDb, logIngestionRunStart, logIngestionRunEnd } from '../db/database.js';
import { cleanCompany } from '../extractor/cleaner.js';
import { extractContacts } from '../extractor/contact-extractor.js';
import { ingestAnnouncement } from '../matcher/card-resolver.js';
import { searchAnnouncements, type SearchEvent } from '../scraper/bxsearch-scraper.js';
import { parseDetailPage, type ParsedDetail } from '../scraper/detail-parser.js';
import { randomBetween, retryFetch, sleep, type PageFetcher } from '../scraper/fetcher.js';
import { ParseError, errorMessage, isTransientFetchError } from '../types/errors.js';
import type { AnnouncementStub, KeywordOutcome, NewAnnouncement, SearchFilters } from '../types/index.js';
import { alreadyIngested } from './dedup-gate.js';

export const BXSEARCH_SOURCE = 'ccgp-bxsearch';

export interface KeywordSummary {
  keyword: string;
  outcome: KeywordOutcome;
  pages: number;
  stubs: number;
  error: string | null;
}

export interface CrawlSummary {
  runId: number | null;
  status: 'completed' | 'cancelled';
  keywords: KeywordSummary[];
  stubs: number;
  skipped: number;
  newAnnouncements: number;
  failedDetails: number;
  mentions: number;
  cardsCreated: number;
  cardsUpdated: number;
  mentionsLinked: number;
  unattributed: number;
  startedAt: string;
  finishedAt: string | null;
}

export type CrawlEvent =
  | SearchEvent
  | { type: 'skipped'; keyword: string; url: string }
  | { type: 'detail_failed'; keyword: string; url: string; error: string }
  | {
      type: 'ingested';
      keyword: string;
      url: string;
      announcementId: number;
      mentions: number;
      cardsCreated: number;
      cardsUpdated: number;
      unattributed: number;
    }
  | { type: 'run_done'; summary: CrawlSummary };

export type CrawlSettings = Pick<
  Settings,
  'fetchTimeoutMs' | 'fetchRetries' | 'retryDelayMs' | 'pageDelay' | 'detailDelay' | 'lookbackChars'
>;

export interface CrawlOptions {
  fetcher: PageFetcher;
  signal?: AbortSignal;
  onEvent?: (event: CrawlEvent) => void;
  settings?: CrawlSettings;
  sleep?: (ms: number) => Promise<void>;
  random?: () => number;
}

export function buildAnnouncement(stub: AnnouncementStub, parsed: ParsedDetail, scrapedAt: string): NewAnnouncement {
  return {
    url: stub.url,
    title: parsed.title || stub.title,
    publishDate: parsed.publishDate || stub.publishDate,
    source: BXSEARCH_SOURCE,
    category: parsed.category,
    buyerName: parsed.buyerName || cleanCompany(stub.buyerName),
    agentName: parsed.agentName || cleanCompany(stub.agentName),
    supplierName: parsed.supplierName,
    projectName: parsed.projectName,
    bidAmount: parsed.bidAmount,
    region: parsed.region,
    content: parsed.contactText,
    scrapedAt,
  };
}

function emptySummary(runId: number | null): CrawlSummary {
  return {
    runId,
    status: 'completed',
    keywords: [],
    stubs: 0,
    skipped: 0,
    newAnnouncements: 0,
    failedDetails: 0,
    mentions: 0,
    cardsCreated: 0,
    cardsUpdated: 0,
    mentionsLinked: 0,
    unattributed: 0,
    startedAt: new Date().toISOString(),
    finishedAt: null,
  };
}

export async function runBxSearch(filters: SearchFilters, options: CrawlOptions): Promise<CrawlSummary> {
  const settings = options.settings ?? loadSettings();
  const wait = options.sleep ?? sleep;
  const { signal } = options;
  const retry = {
    timeoutMs: settings.fetchTimeoutMs,
    retries: settings.fetchRetries,
    delayMs: settings.retryDelayMs,
    sleep: options.sleep,
  };

  const emit = (event: CrawlEvent) => {
    options.onEvent?.(event);
  };

  await initializeDb();
  const runId = await logIngestionRunStart(BXSEARCH_SOURCE, filters);
  const summary = emptySummary(runId);
  let detailsFetched = 0;

  console.log(`Starting bxsearch run ${runId ?? '-'} for ${filters.keywords.length} keyword(s)`);

  try {
    const events = searchAnnouncements(filters, {
      fetcher: options.fetcher,
      retry,
      pageDelay: settings.pageDelay,
      signal,
      sleep: options.sleep,
      random: options.random,
    });

    for await (const event of events) {
      emit(event);

      if (event.type === 'keyword_done') {
        summary.keywords.push({
          keyword: event.keyword,
          outcome: event.outcome,
          pages: event.pages,
          stubs: event.stubs,
          error: event.error,
        });
        continue;
      }
      if (event.type !== 'stub') continue;

      summary.stubs++;
      // Rows already parsed from this page are drained without network work
      if (signal?.aborted) continue;

      const { keyword, stub } = event;

      if (await alreadyIngested(stub.url)) {
        summary.skipped++;
        emit({ type: 'skipped', keyword, url: stub.url });
        continue;
      }

      if (detailsFetched > 0) {
        await wait(randomBetween(settings.detailDelay, options.random));
        if (signal?.aborted) continue;
      }
      detailsFetched++;

      let parsed: ParsedDetail;
      try {
        const html = await retryFetch(options.fetcher, stub.url, retry);
        parsed = parseDetailPage(html, stub.url);
      } catch (error) {
        if (!isTransientFetchError(error) && !(error instanceof ParseError)) throw error;
        console.warn(`Skipping ${stub.url}: ${errorMessage(error)}`);
        summary.failedDetails++;
        emit({ type: 'detail_failed', keyword, url: stub.url, error: errorMessage(error) });
        continue;
      }

      const mentions = extractContacts(parsed.contactText, {
        lookbackChars: settings.lookbackChars,
        excludedNames: parsed.experts,
      });
      const result = await ingestAnnouncement(
        buildAnnouncement(stub, parsed, new Date().toISOString()),
        mentions
      );

      if (!result.created) {
        summary.skipped++;
        emit({ type: 'skipped', keyword, url: stub.url });
        continue;
      }

      const cardsCreated = result.outcomes.filter(o => o.created).length;
      const cardsUpdated = result.outcomes.length - cardsCreated;

      summary.newAnnouncements++;
      summary.mentions += result.mentions;
      summary.cardsCreated += cardsCreated;
      summary.cardsUpdated += cardsUpdated;
      summary.mentionsLinked += result.outcomes.filter(o => o.mentionLinked).length;
      summary.unattributed += result.unattributed;

      emit({
        type: 'ingested',
        keyword,
        url: stub.url,
        announcementId: result.announcementId,
        mentions: result.mentions,
        cardsCreated,
        cardsUpdated,
        unattributed: result.unattributed,
      });
    }
  } catch (error) {
    summary.finishedAt = new Date().toISOString();
    console.error(`bxsearch run ${runId ?? '-'} failed:`, errorMessage(error));
    if (runId !== null) {
      try {
        await logIngestionRunEnd(runId, 'failed', summary, errorMessage(error));
      } catch (logError) {
        console.error('Could not record failed run:', logError);
      }
    }
    throw error;
  }

  summary.status = signal?.aborted ? 'cancelled' : 'completed';
  summary.finishedAt = new Date().toISOString();
  if (runId !== null) {
    await logIngestionRunEnd(runId, summary.status, summary);
  }

  console.log(
    `bxsearch run ${runId ?? '-'} ${summary.status}: ${summary.newAnnouncements} new announcements, ` +
    `${summary.cardsCreated} cards created, ${summary.cardsUpdated} updated`
  );
  emit({ type: 'run_done', summary });
  return summary;
}
