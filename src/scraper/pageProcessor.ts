import type { CheerioAPI } from 'cheerio';
import type { ScrapeConfig, ScrapeRecord } from '../types.js';
import { extractRecord } from './fieldExtractor.js';
import { readAttribute, select } from './selectorResolver.js';

export interface ParsedPage {
  url: string;
  $: CheerioAPI;
}

export interface PageResult {
  records: ScrapeRecord[];
  nextUrl: string | null;
}

/** Resolves `href` against the page it was found on; only absolute http(s) targets qualify. */
export function resolveNextUrl(href: string | undefined, pageUrl: string): string | null {
  if (!href) {
    return null;
  }
  try {
    const url = new URL(href, pageUrl);
    if (url.protocol !== 'http:' && url.protocol !== 'https:') {
      return null;
    }
    return url.toString();
  } catch {
    return null;
  }
}

export function findNextUrl(page: ParsedPage, nextPageSelector: string): string | null {
  // several candidates: only the first one is followed
  const [link] = select(page.$, nextPageSelector);
  if (!link) {
    return null;
  }
  return resolveNextUrl(readAttribute(link, 'href'), page.url);
}

export function processPage(page: ParsedPage, config: Pick<ScrapeConfig, 'itemSelector' | 'fields' | 'pagination'>): PageResult {
  const records = select(page.$, config.itemSelector).map(item => extractRecord(item, config.fields));
  const nextUrl = config.pagination ? findNextUrl(page, config.pagination.nextPageSelector) : null;
  return { records, nextUrl };
}
