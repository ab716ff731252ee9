export type ScraperErrorCode = 'CONFIG' | 'FETCH' | 'PARSE' | 'ABORTED';

/**
 * Base class for every failure that ends a scrape run.
 * Extraction gaps (selectors matching nothing) are not errors and never reach here.
 */
export class ScraperError extends Error {
  readonly code: ScraperErrorCode;

  constructor(code: ScraperErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** Invalid or incomplete configuration. Raised before any network activity. */
export class ConfigError extends ScraperError {
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], options?: { cause?: unknown }) {
    super('CONFIG', issues.length > 0 ? `${message}\n${issues.map(issue => `  - ${issue}`).join('\n')}` : message, options);
    this.issues = issues;
  }
}

/** Transport failure or non-success response for a page fetch. */
export class FetchError extends ScraperError {
  readonly url: string;
  readonly status?: number;

  constructor(url: string, message: string, status?: number, options?: { cause?: unknown }) {
    super('FETCH', `Failed to fetch ${url}: ${message}`, options);
    this.url = url;
    this.status = status;
  }
}

/** Fetched body could not be read as a document. */
export class ParseError extends ScraperError {
  readonly url: string;

  constructor(url: string, message: string, options?: { cause?: unknown }) {
    super('PARSE', `Failed to parse ${url}: ${message}`, options);
    this.url = url;
  }
}

export class ScrapeAbortedError extends ScraperError {
  constructor(message = 'Scrape aborted') {
    super('ABORTED', message);
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
