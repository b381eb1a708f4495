import type { PageFetcher } from '../scraper/fetcher.js';

type Response = string | Error | ((url: string) => string | Error);

/**
 * In-process PageFetcher: answers by URL predicate, in registration order.
 */
export class FakeFetcher implements PageFetcher {
  readonly calls: string[] = [];
  closed = false;
  private routes: { match: (url: string) => boolean; response: Response }[] = [];

  on(match: string | ((url: string) => boolean), response: Response): this {
    const predicate = typeof match === 'string' ? (url: string) => url === match : match;
    this.routes.push({ match: predicate, response });
    return this;
  }

  async fetch(url: string): Promise<string> {
    this.calls.push(url);
    const route = this.routes.find(r => r.match(url));
    if (!route) throw new Error(`No fake response for ${url}`);

    const result = typeof route.response === 'function' ? route.response(url) : route.response;
    if (result instanceof Error) throw result;
    return result;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

export const noSleep = async (): Promise<void> => {};

/** Matches a list page URL for a keyword and page index */
export function listPage(keyword: string, pageIndex: number) {
  return (url: string) =>
    url.includes(`page_index=${pageIndex}&`) && url.includes(`kw=${encodeURIComponent(keyword)}&`);
}
