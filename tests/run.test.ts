import { describe, expect, it } from 'vitest';
import { ConfigError } from '../src/errors.js';
import { createSilentLogger } from '../src/logger.js';
import { run, scrape } from '../src/scraper/index.js';
import { QUOTES_BASE, createSiteFetcher, pageChain, quotePage, quotesConfig } from './fixtures.js';

const pause = async () => undefined;

describe('run', () => {
  it('rejects a config without fields before any fetch', async () => {
    const { fields: _fields, ...withoutFields } = quotesConfig;
    const fetchPage = createSiteFetcher(pageChain(2));

    await expect(run(withoutFields, { fetchPage, pause, logger: createSilentLogger() })).rejects.toBeInstanceOf(ConfigError);
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('rejects a malformed selector before any fetch', async () => {
    const fetchPage = createSiteFetcher(pageChain(2));
    const config = { ...quotesConfig, item_selector: 'div.quote[' };

    await expect(run(config, { fetchPage, pause, logger: createSilentLogger() })).rejects.toThrow(
      'item_selector: is not a valid CSS selector'
    );
    expect(fetchPage).not.toHaveBeenCalled();
  });

  it('yields identical results for identical page sequences', async () => {
    const pages = {
      [`${QUOTES_BASE}/`]: quotePage(1, 10, '/page/2/'),
      [`${QUOTES_BASE}/page/2/`]: quotePage(2, 8)
    };

    const first = await run(quotesConfig, { fetchPage: createSiteFetcher(pages), pause, logger: createSilentLogger() });
    const second = await run(quotesConfig, { fetchPage: createSiteFetcher(pages), pause, logger: createSilentLogger() });

    expect(JSON.stringify(second)).toBe(JSON.stringify(first));
  });

  it('reports the validated config and page count', async () => {
    const fetchPage = createSiteFetcher(pageChain(2, 3));

    const result = await scrape(quotesConfig, { fetchPage, pause, logger: createSilentLogger() });

    expect(result.pagesFetched).toBe(2);
    expect(result.records).toHaveLength(6);
    expect(result.config.fields.map(([name]) => name)).toEqual(['text', 'author', 'tags']);
  });

  it('returns frozen records', async () => {
    const fetchPage = createSiteFetcher(pageChain(1));

    const records = await run(quotesConfig, { fetchPage, pause, logger: createSilentLogger() });

    expect(Object.isFrozen(records)).toBe(true);
    expect(Object.isFrozen(records[0])).toBe(true);
    expect(Object.isFrozen(records[0].tags)).toBe(true);
  });
});
