import { vi } from 'vitest';
import { FetchError } from '../src/errors.js';
import { parseHtml } from '../src/scraper/fetcher.js';

export const QUOTES_BASE = 'https://quotes.example.test';

export const quotesConfig = {
  start_url: `${QUOTES_BASE}/`,
  item_selector: 'div.quote',
  fields: {
    text: { selector: 'span.text' },
    author: { selector: 'small.author' },
    tags: { selector: 'div.tags a.tag', multiple: true }
  },
  pagination: { next_page_selector: 'li.next a', max_pages: 5 }
};

export function quoteBlock(page: number, index: number): string {
  return `
    <div class="quote">
      <span class="text">Quote ${page}.${index}</span>
      <span>by <small class="author">Author ${page}.${index}</small></span>
      <div class="tags">
        Tags:
        <a class="tag" href="/tag/p${page}">p${page}</a>
        <a class="tag" href="/tag/i${index}">i${index}</a>
      </div>
    </div>`;
}

export function quotePage(page: number, count: number, nextHref?: string): string {
  const quotes = Array.from({ length: count }, (_unused, index) => quoteBlock(page, index + 1)).join('\n');
  const pager = nextHref ? `<ul class="pager"><li class="next"><a href="${nextHref}">Next</a></li></ul>` : '';
  return `<!DOCTYPE html><html><body><div class="col-md-8">${quotes}${pager}</div></body></html>`;
}

/** In-process stand-in for the HTTP transport: serves the given pages, 404s everything else. */
export function createSiteFetcher(pages: Record<string, string>) {
  return vi.fn(async (url: string) => {
    const html = pages[url];
    if (html === undefined) {
      throw new FetchError(url, 'HTTP 404', 404);
    }
    return parseHtml(html, url);
  });
}

/** A chain of `length` pages, each linking to the next one. */
export function pageChain(length: number, itemsPerPage = 2): Record<string, string> {
  const pages: Record<string, string> = {};
  for (let page = 1; page <= length; page += 1) {
    const url = page === 1 ? `${QUOTES_BASE}/` : `${QUOTES_BASE}/page/${page}/`;
    const next = page < length ? `/page/${page + 1}/` : undefined;
    pages[url] = quotePage(page, itemsPerPage, next);
  }
  return pages;
}
