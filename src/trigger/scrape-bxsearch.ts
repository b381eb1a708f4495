/**
 * bxsearch Crawl Task
 * Runs a full search -> detail -> business card crawl outside the web process
 */

import dotenv from "dotenv";
import { task, logger } from "@trigger.dev/sdk/v3";
import { loadSettings } from "../config/settings.js";
import { closeDb } from "../db/database.js";
import { runBxSearch, type CrawlEvent, type CrawlSummary } from "../pipeline/crawl-run.js";
import { createFetcher } from "../scraper/create-fetcher.js";
import { normalizeSearchRequest, type SearchRequest } from "../scraper/search-request.js";

dotenv.config({ path: ".env.local" });
dotenv.config();

export type ScrapeBxsearchPayload = SearchRequest;

function logEvent(event: CrawlEvent): void {
  switch (event.type) {
    case "keyword_done":
      logger.info("Keyword finished", {
        keyword: event.keyword,
        outcome: event.outcome,
        pages: event.pages,
        stubs: event.stubs,
        error: event.error,
      });
      break;
    case "detail_failed":
      logger.warn("Detail page skipped", { url: event.url, error: event.error });
      break;
    case "ingested":
      logger.info("Announcement stored", {
        url: event.url,
        mentions: event.mentions,
        cardsCreated: event.cardsCreated,
        cardsUpdated: event.cardsUpdated,
      });
      break;
    default:
      break;
  }
}

export const scrapeBxsearch = task({
  id: "scrape-bxsearch",
  maxDuration: 3600, // 1 hour
  retry: {
    maxAttempts: 1,
  },
  run: async (payload: ScrapeBxsearchPayload): Promise<CrawlSummary> => {
    const settings = loadSettings();
    const filters = await normalizeSearchRequest(
      { keywordFile: payload.keywords ? undefined : settings.keywordFile, ...payload },
      { maxPages: settings.maxPages }
    );

    logger.info("bxsearch crawl started", { keywords: filters.keywords, maxPages: filters.maxPages });

    const fetcher = createFetcher(settings);

    try {
      const summary = await runBxSearch(filters, { fetcher, settings, onEvent: logEvent });

      logger.info("bxsearch crawl complete", {
        newAnnouncements: summary.newAnnouncements,
        skipped: summary.skipped,
        failedDetails: summary.failedDetails,
        cardsCreated: summary.cardsCreated,
        cardsUpdated: summary.cardsUpdated,
      });
      return summary;
    } finally {
      await fetcher.close();
      closeDb();
    }
  },
});
