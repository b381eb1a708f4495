#!/usr/bin/env node
/**
 * Command line entry point
 *
 *   bxsearch  --kw 智能 --kw 机房,弱电 [--kw-file path] [--mode fulltext|title] [--pin-mu all|goods|engineering|services]
 *             [--bid-sort all|central|local] [--bid-type 0-12|name] [--time 1week | --start YYYY-MM-DD --end YYYY-MM-DD]
 *             [--max-pages N]
 *   cards     --company NAME [--like] [--limit N]
 *   mentions  --card ID
 *   stats
 *   reprocess --url URL
 */

import dotenv from 'dotenv';
import { parseArgs } from 'node:util';
import { pathToFileURL } from 'url';
import { loadSettings, type Settings } from './config/settings.js';
import { closeDb, dbHelpers, initializeDb } from './db/database.js';
import { findCards, listCardMentions, reprocessAnnouncement } from './matcher/card-resolver.js';
import { runBxSearch, type CrawlEvent } from './pipeline/crawl-run.js';
import { createFetcher } from './scraper/create-fetcher.js';
import { normalizeSearchRequest } from './scraper/search-request.js';
import { SearchParamsError, errorMessage } from './types/errors.js';
import type { BusinessCard } from './types/index.js';

const USAGE = `Usage: tender-cards <command> [options]

Commands:
  bxsearch   Search announcements and merge their contacts into business cards
  cards      List business cards for a company (--company, --like, --limit)
  mentions   List announcements that credited a card (--card)
  stats      Directory statistics
  reprocess  Re-extract contacts from a stored announcement (--url)`;

/**
 * Map bxsearch flags onto a search request; validation happens in normalizeSearchRequest
 */
export function parseBxsearchArgs(args: string[]) {
  const { values } = parseArgs({
    args,
    options: {
      kw: { type: 'string', multiple: true },
      'kw-file': { type: 'string' },
      mode: { type: 'string' },
      'pin-mu': { type: 'string' },
      'bid-sort': { type: 'string' },
      'bid-type': { type: 'string' },
      time: { type: 'string' },
      start: { type: 'string' },
      end: { type: 'string' },
      'max-pages': { type: 'string' },
    },
    strict: true,
  });

  return {
    keywords: values.kw,
    keywordFile: values['kw-file'],
    searchMode: values.mode,
    pinMu: values['pin-mu'],
    bidSort: values['bid-sort'],
    bidType: values['bid-type'],
    timePreset: values.time,
    startDate: values.start,
    endDate: values.end,
    maxPages: values['max-pages'],
  };
}

export function formatEvent(event: CrawlEvent): string | null {
  switch (event.type) {
    case 'keyword_start':
      return `\n[${event.keyword}] searching...`;
    case 'page':
      return `[${event.keyword}] page ${event.pageIndex}: ${event.rows} rows${event.throttled ? ' (throttled)' : ''}`;
    case 'keyword_done':
      return `[${event.keyword}] ${event.outcome} after ${event.pages} page(s), ${event.stubs} result(s)` +
        (event.error ? `: ${event.error}` : '');
    case 'skipped':
      return `  = already stored ${event.url}`;
    case 'detail_failed':
      return `  ! ${event.url}: ${event.error}`;
    case 'ingested':
      return `  + ${event.url} (${event.mentions} contacts, ${event.cardsCreated} new cards, ${event.cardsUpdated} updated)`;
    default:
      return null;
  }
}

export function formatCard(card: BusinessCard): string {
  return [
    `#${card.id} ${card.company || '(no company)'} / ${card.contactName || '(no name)'}`,
    `    phones: ${card.phones.join(', ') || '-'}`,
    `    emails: ${card.emails.join(', ') || '-'}`,
    `    announcements: ${card.announcementCount}, updated ${card.updatedAt}`,
  ].join('\n');
}

async function commandBxsearch(args: string[], settings: Settings): Promise<number> {
  const request = parseBxsearchArgs(args);
  if (!request.keywords && !request.keywordFile) {
    request.keywordFile = settings.keywordFile;
  }
  const filters = await normalizeSearchRequest(request, { maxPages: settings.maxPages });
  const fetcher = createFetcher(settings);
  const controller = new AbortController();

  const onSigint = () => {
    console.log('\nStopping after the current item...');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  console.log('='.repeat(60));
  console.log(`bxsearch: ${filters.keywords.join(', ')} (max ${filters.maxPages} pages per keyword)`);
  console.log('='.repeat(60));

  try {
    const summary = await runBxSearch(filters, {
      fetcher,
      settings,
      signal: controller.signal,
      onEvent: event => {
        const line = formatEvent(event);
        if (line !== null) console.log(line);
      },
    });

    console.log();
    console.log('='.repeat(60));
    console.log(`Run ${summary.status}`);
    console.log(`  Results:           ${summary.stubs}`);
    console.log(`  Already stored:    ${summary.skipped}`);
    console.log(`  New announcements: ${summary.newAnnouncements}`);
    console.log(`  Failed details:    ${summary.failedDetails}`);
    console.log(`  Cards created:     ${summary.cardsCreated}`);
    console.log(`  Cards updated:     ${summary.cardsUpdated}`);
    console.log(`  Unattributed:      ${summary.unattributed}`);
    console.log('='.repeat(60));
    return 0;
  } finally {
    process.off('SIGINT', onSigint);
    await fetcher.close();
  }
}

async function commandCards(args: string[]): Promise<number> {
  const { values } = parseArgs({
    args,
    options: {
      company: { type: 'string' },
      like: { type: 'boolean', default: false },
      limit: { type: 'string' },
    },
  });

  if (!values.company) throw new SearchParamsError('cards needs --company');
  const limit = values.limit ? parseInt(values.limit, 10) : 50;
  if (isNaN(limit) || limit < 1) throw new SearchParamsError(`Invalid --limit: ${values.limit}`);

  const cards = await findCards(values.company, { like: values.like, limit });
  if (cards.length === 0) {
    console.log(`No cards for ${values.company}`);
    return 0;
  }
  cards.forEach(card => console.log(formatCard(card)));
  return 0;
}

async function commandMentions(args: string[]): Promise<number> {
  const { values } = parseArgs({ args, options: { card: { type: 'string' } } });
  const cardId = values.card ? parseInt(values.card, 10) : NaN;
  if (isNaN(cardId)) throw new SearchParamsError('mentions needs --card <id>');

  const mentions = await listCardMentions(cardId);
  mentions.forEach(m => console.log(`${m.publishDate}  [${m.role}] ${m.title}\n    ${m.url}`));
  if (mentions.length === 0) console.log(`No announcements for card ${cardId}`);
  return 0;
}

async function commandStats(): Promise<number> {
  const stats = await dbHelpers.getStats();
  console.log(`Announcements: ${stats.total_announcements}`);
  console.log(`Cards:         ${stats.total_cards} (${stats.cards_with_phone} with phone, ${stats.cards_with_email} with email)`);
  console.log(`Card mentions: ${stats.total_card_mentions}`);
  if (stats.top_companies.length > 0) {
    console.log('\nTop companies:');
    stats.top_companies.forEach(c => console.log(`  ${c.cards.toString().padStart(4)}  ${c.company}`));
  }
  return 0;
}

async function commandReprocess(args: string[], settings: Settings): Promise<number> {
  const { values } = parseArgs({ args, options: { url: { type: 'string' } } });
  if (!values.url) throw new SearchParamsError('reprocess needs --url');

  const result = await reprocessAnnouncement(values.url, { lookbackChars: settings.lookbackChars });
  if (!result) {
    console.error(`Announcement not stored: ${values.url}`);
    return 1;
  }

  const created = result.outcomes.filter(o => o.created).length;
  console.log(`${result.mentions} contacts: ${created} new cards, ${result.outcomes.length - created} updated, ${result.unattributed} unattributed`);
  return 0;
}

export async function main(argv: string[]): Promise<number> {
  const [command, ...args] = argv;
  const settings = loadSettings();

  try {
    switch (command) {
      case 'bxsearch':
        return await commandBxsearch(args, settings);
      case 'cards':
        await initializeDb();
        return await commandCards(args);
      case 'mentions':
        await initializeDb();
        return await commandMentions(args);
      case 'stats':
        return await commandStats();
      case 'reprocess':
        await initializeDb();
        return await commandReprocess(args, settings);
      default:
        console.log(USAGE);
        return command ? 1 : 0;
    }
  } catch (error) {
    if (error instanceof SearchParamsError || (error instanceof TypeError && 'code' in error)) {
      console.error(`Error: ${error.message}`);
      return 2;
    }
    console.error(`Error: ${errorMessage(error)}`);
    return 1;
  } finally {
    closeDb();
  }
}

const isMain = process.argv[1] !== undefined && import.meta.url === pathToFileURL(process.argv[1]).href;

if (isMain) {
  dotenv.config({ path: '.env.local' });
  dotenv.config();
  main(process.argv.slice(2)).then(code => {
    process.exitCode = code;
  }, error => {
    console.error(error);
    process.exitCode = 1;
  });
}
