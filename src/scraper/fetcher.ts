import axios from 'axios';
import * as cheerio from 'cheerio';
import { FetchError, ParseError, ScrapeAbortedError, describeError } from '../errors.js';
import type { ScraperSettings } from '../types.js';
import type { ParsedPage } from './pageProcessor.js';

export type PageFetcher = (url: string) => Promise<ParsedPage>;

const PARSEABLE_CONTENT_TYPE = /html|xml|^text\//i;

export const DEFAULT_TIMEOUT_MS = 10000;

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/121.0.0.0 Safari/537.36';

export function parseHtml(html: string, url: string): ParsedPage {
  try {
    return { url, $: cheerio.load(html) };
  } catch (error) {
    throw new ParseError(url, describeError(error), { cause: error });
  }
}

async function fetchHtml(url: string, settings: ScraperSettings, signal?: AbortSignal): Promise<string> {
  try {
    const response = await axios.get<unknown>(url, {
      headers: {
        'User-Agent': settings.userAgent,
        'Accept-Language': 'en-US,en;q=0.9',
        Accept: 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8'
      },
      timeout: settings.requestTimeoutMs,
      responseType: 'text',
      signal
    });

    const contentType = String(response.headers['content-type'] ?? '');
    if (contentType && !PARSEABLE_CONTENT_TYPE.test(contentType)) {
      throw new ParseError(url, `unsupported content type "${contentType}"`);
    }
    if (typeof response.data !== 'string') {
      throw new ParseError(url, 'response body is not text');
    }
    return response.data;
  } catch (error) {
    if (error instanceof ParseError) {
      throw error;
    }
    if (signal?.aborted) {
      throw new ScrapeAbortedError();
    }
    if (axios.isAxiosError(error)) {
      const status = error.response?.status;
      const reason = status ? `HTTP ${status}` : error.message;
      throw new FetchError(url, reason, status, { cause: error });
    }
    throw new FetchError(url, describeError(error), undefined, { cause: error });
  }
}

export function createHttpFetcher(settings: ScraperSettings, signal?: AbortSignal): PageFetcher {
  return async (url: string) => parseHtml(await fetchHtml(url, settings, signal), url);
}
