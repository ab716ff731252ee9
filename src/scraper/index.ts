import { validateConfig } from '../config/schema.js';
import type { Logger } from '../logger.js';
import type { ResultSet, ScrapeConfig, ScraperSettings } from '../types.js';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT, createHttpFetcher } from './fetcher.js';
import type { PageFetcher } from './fetcher.js';
import { PaginationDriver } from './paginationDriver.js';
import type { Pause } from './pause.js';

export interface RunOptions {
  /** Transport override; defaults to the axios-backed fetcher. */
  fetchPage?: PageFetcher;
  pause?: Pause;
  signal?: AbortSignal;
  logger?: Logger;
  settings?: Partial<ScraperSettings>;
}

export interface RunResult {
  config: ScrapeConfig;
  records: ResultSet;
  pagesFetched: number;
}

export async function scrape(rawConfig: unknown, options: RunOptions = {}): Promise<RunResult> {
  // validation happens before a fetcher even exists
  const config = validateConfig(rawConfig);
  const fetchPage = options.fetchPage ?? createHttpFetcher({
    userAgent: options.settings?.userAgent ?? DEFAULT_USER_AGENT,
    requestTimeoutMs: options.settings?.requestTimeoutMs ?? DEFAULT_TIMEOUT_MS
  }, options.signal);

  const driver = new PaginationDriver(config, {
    fetchPage,
    pause: options.pause,
    signal: options.signal,
    logger: options.logger
  });
  const records = await driver.run();
  return { config, records, pagesFetched: driver.getPageCount() };
}

/** Validates `rawConfig` and crawls it, returning the ordered records. */
export async function run(rawConfig: unknown, options: RunOptions = {}): Promise<ResultSet> {
  const { records } = await scrape(rawConfig, options);
  return records;
}

export { validateConfig, DEFAULT_MAX_PAGES } from '../config/schema.js';
export { loadConfigFile } from '../config/loadConfig.js';
export { ConfigError, FetchError, ParseError, ScrapeAbortedError, ScraperError } from '../errors.js';
export { exportResultSet } from '../output/exporter.js';
export type { FieldSpec, FieldValue, PaginationSpec, ResultSet, ScrapeConfig, ScrapeRecord, ScraperSettings } from '../types.js';
export type { PageFetcher } from './fetcher.js';
export type { ParsedPage } from './pageProcessor.js';
export type { Pause } from './pause.js';
