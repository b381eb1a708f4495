/**
 * Keeps at most one in-process crawl run, its cancel handle and its recent events.
 */

import type { PageFetcher } from '../scraper/fetcher.js';
import { RunInProgressError, errorMessage } from '../types/errors.js';
import type { SearchFilters } from '../types/index.js';
import { runBxSearch, type CrawlEvent, type CrawlSettings, type CrawlSummary } from './crawl-run.js';

export interface RunStatus {
  running: boolean;
  stopping: boolean;
  filters: SearchFilters | null;
  startedAt: string | null;
  finishedAt: string | null;
  summary: CrawlSummary | null;
  error: string | null;
  events: CrawlEvent[];
}

export interface RunManagerDeps {
  createFetcher: () => PageFetcher;
  settings?: CrawlSettings;
  maxEvents?: number;
}

export class RunManager {
  private controller: AbortController | null = null;
  private current: Promise<void> | null = null;
  private events: CrawlEvent[] = [];
  private state: Omit<RunStatus, 'running' | 'stopping' | 'events'> = {
    filters: null,
    startedAt: null,
    finishedAt: null,
    summary: null,
    error: null,
  };

  constructor(private readonly deps: RunManagerDeps) {}

  get running(): boolean {
    return this.current !== null;
  }

  start(filters: SearchFilters): void {
    if (this.current) throw new RunInProgressError();

    const controller = new AbortController();
    const fetcher = this.deps.createFetcher();
    const maxEvents = this.deps.maxEvents ?? 200;

    this.controller = controller;
    this.events = [];
    this.state = {
      filters,
      startedAt: new Date().toISOString(),
      finishedAt: null,
      summary: null,
      error: null,
    };

    const onEvent = (event: CrawlEvent) => {
      this.events.push(event);
      if (this.events.length > maxEvents) {
        this.events.splice(0, this.events.length - maxEvents);
      }
    };

    this.current = runBxSearch(filters, {
      fetcher,
      signal: controller.signal,
      onEvent,
      settings: this.deps.settings,
    })
      .then(summary => {
        this.state.summary = summary;
      })
      .catch((error: unknown) => {
        console.error('Crawl run failed:', error);
        this.state.error = errorMessage(error);
      })
      .finally(async () => {
        try {
          await fetcher.close();
        } catch (closeError) {
          console.warn('Failed to close fetcher:', closeError);
        }
        this.state.finishedAt = new Date().toISOString();
        this.controller = null;
        this.current = null;
      });
  }

  /** Request cancellation; the run stops at the next page or item boundary */
  stop(): boolean {
    if (!this.controller) return false;
    this.controller.abort();
    return true;
  }

  status(): RunStatus {
    return {
      running: this.current !== null,
      stopping: this.controller?.signal.aborted ?? false,
      ...this.state,
      events: [...this.events],
    };
  }

  async waitForIdle(): Promise<void> {
    if (this.current) await this.current;
  }
}
