/**
 * Error taxonomy for the crawl pipeline.
 *
 * Transient fetch errors are retried and then skipped, parse errors skip one
 * announcement, store errors abort the run.
 */

export class FetchTimeoutError extends Error {
  readonly url: string;

  constructor(url: string, timeoutMs: number) {
    super(`Timed out after ${timeoutMs}ms fetching ${url}`);
    this.name = 'FetchTimeoutError';
    this.url = url;
  }
}

export class FetchNetworkError extends Error {
  readonly url: string;
  readonly status: number | null;

  constructor(url: string, message: string, status: number | null = null) {
    super(`Fetching ${url} failed: ${message}`);
    this.name = 'FetchNetworkError';
    this.url = url;
    this.status = status;
  }
}

export class ParseError extends Error {
  readonly url: string;

  constructor(url: string, message: string) {
    super(`Could not parse ${url}: ${message}`);
    this.name = 'ParseError';
    this.url = url;
  }
}

export class StoreError extends Error {
  constructor(message: string, cause: unknown) {
    super(`${message}: ${cause instanceof Error ? cause.message : String(cause)}`, { cause });
    this.name = 'StoreError';
  }
}

export class SearchParamsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SearchParamsError';
  }
}

export function isTransientFetchError(error: unknown): error is FetchTimeoutError | FetchNetworkError {
  return error instanceof FetchTimeoutError || error instanceof FetchNetworkError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}

export class RunInProgressError extends Error {
  constructor() {
    super('A crawl run is already in progress');
    this.name = 'RunInProgressError';
  }
}
