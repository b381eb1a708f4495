/**
 * Headless Chrome fetcher for pages that only render behind the portal's bot checks.
 * Drives an installed Chrome through puppeteer-core; no browser is downloaded.
 */

import puppeteer, { TimeoutError, type Browser, type Page } from 'puppeteer-core';
import { FetchNetworkError, FetchTimeoutError, errorMessage } from '../types/errors.js';
import type { PageFetcher } from './fetcher.js';

export interface BrowserFetcherOptions {
  executablePath: string;
  userAgent: string;
}

export class BrowserPageFetcher implements PageFetcher {
  private browser: Browser | null = null;
  private page: Page | null = null;

  constructor(private readonly options: BrowserFetcherOptions) {}

  private async getPage(): Promise<Page> {
    if (this.page) return this.page;

    console.log(`Launching Chrome from ${this.options.executablePath}`);
    this.browser = await puppeteer.launch({
      executablePath: this.options.executablePath,
      headless: true,
      args: [
        '--no-sandbox',
        '--disable-setuid-sandbox',
        '--disable-dev-shm-usage',
        '--disable-gpu',
        '--disable-blink-features=AutomationControlled',
        '--window-size=1920,1080',
      ],
    });

    const page = await this.browser.newPage();
    await page.setUserAgent(this.options.userAgent);
    await page.setViewport({ width: 1920, height: 1080 });
    await page.setExtraHTTPHeaders({ 'Accept-Language': 'zh-CN,zh;q=0.9' });
    this.page = page;
    return page;
  }

  async fetch(url: string, timeoutMs: number): Promise<string> {
    const page = await this.getPage();

    try {
      const response = await page.goto(url, { waitUntil: 'domcontentloaded', timeout: timeoutMs });
      if (response && response.status() >= 400) {
        throw new FetchNetworkError(url, `HTTP ${response.status()}`, response.status());
      }
      return await page.content();
    } catch (error) {
      if (error instanceof FetchNetworkError) throw error;
      if (error instanceof TimeoutError) throw new FetchTimeoutError(url, timeoutMs);
      throw new FetchNetworkError(url, errorMessage(error));
    }
  }

  async close(): Promise<void> {
    const browser = this.browser;
    this.browser = null;
    this.page = null;
    if (browser) {
      await browser.close();
    }
  }
}
