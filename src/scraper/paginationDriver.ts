import { ScrapeAbortedError } from '../errors.js';
import { Logger } from '../logger.js';
import type { ResultSet, ScrapeConfig } from '../types.js';
import type { PageFetcher } from './fetcher.js';
import { processPage } from './pageProcessor.js';
import { sleep } from './pause.js';
import type { Pause } from './pause.js';
import { ResultAggregator } from './resultAggregator.js';

export type DriverState = 'idle' | 'fetching' | 'processing' | 'delaying' | 'done' | 'failed';

export interface PaginationDriverOptions {
  fetchPage: PageFetcher;
  pause?: Pause;
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Sequential crawl loop: one page in flight, bounded by `maxPages`, ending
 * early when a page has no usable "next" link. Any fetch or parse failure
 * fails the whole run and the records gathered so far are dropped.
 */
export class PaginationDriver {
  private readonly fetchPage: PageFetcher;
  private readonly pause: Pause;
  private readonly signal?: AbortSignal;
  private readonly logger: Logger;

  private state: DriverState = 'idle';
  private currentUrl: string | null;
  private pageCount = 0;
  private aggregator = new ResultAggregator();

  constructor(private readonly config: ScrapeConfig, options: PaginationDriverOptions) {
    this.fetchPage = options.fetchPage;
    this.pause = options.pause ?? sleep;
    this.signal = options.signal;
    this.logger = options.logger ?? new Logger();
    this.currentUrl = config.startUrl;
  }

  getState(): DriverState {
    return this.state;
  }

  getPageCount(): number {
    return this.pageCount;
  }

  async run(): Promise<ResultSet> {
    if (this.state !== 'idle') {
      throw new Error(`PaginationDriver cannot run from state "${this.state}"`);
    }

    try {
      const result = await this.loop();
      this.state = 'done';
      return result;
    } catch (error) {
      this.state = 'failed';
      this.aggregator = new ResultAggregator();
      throw error;
    }
  }

  private async loop(): Promise<ResultSet> {
    const maxPages = this.config.pagination?.maxPages ?? 1;

    while (this.currentUrl) {
      this.throwIfAborted();

      this.state = 'fetching';
      const pageNumber = this.pageCount + 1;
      this.logger.info(`Fetching page ${pageNumber}: ${this.currentUrl}`);
      const page = await this.fetchPage(this.currentUrl);

      this.state = 'processing';
      this.pageCount = pageNumber;
      const { records, nextUrl } = processPage(page, this.config);
      this.logger.info(`Found ${records.length} items on page ${pageNumber}`);
      this.aggregator.append(records);

      if (!this.config.pagination) {
        break;
      }
      if (!nextUrl) {
        this.logger.debug(`No next page link on page ${pageNumber}`);
        break;
      }
      if (this.pageCount >= maxPages) {
        this.logger.debug(`Reached max_pages (${maxPages})`);
        break;
      }

      this.currentUrl = nextUrl;
      if (this.config.delaySeconds > 0) {
        this.state = 'delaying';
        await this.pause(this.config.delaySeconds * 1000, this.signal);
      }
    }

    this.logger.info(`Total items scraped: ${this.aggregator.size}`);
    return this.aggregator.toResultSet();
  }

  private throwIfAborted(): void {
    if (this.signal?.aborted) {
      throw new ScrapeAbortedError();
    }
  }
}
