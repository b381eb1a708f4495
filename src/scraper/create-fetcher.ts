import type { Settings } from '../config/settings.js';
import { BrowserPageFetcher } from './browser-fetcher.js';
import { HttpPageFetcher, type PageFetcher } from './fetcher.js';

export function createFetcher(settings: Pick<Settings, 'fetchMode' | 'chromePath' | 'userAgent'>): PageFetcher {
  if (settings.fetchMode === 'browser') {
    return new BrowserPageFetcher({ executablePath: settings.chromePath, userAgent: settings.userAgent });
  }
  return new HttpPageFetcher(settings.userAgent);
}
