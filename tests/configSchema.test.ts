import { describe, expect, it } from 'vitest';
import { DEFAULT_MAX_PAGES, fieldNames, validateConfig } from '../src/config/schema.js';
import { ConfigError } from '../src/errors.js';
import { quotesConfig } from './fixtures.js';

function issuesOf(raw: unknown): string[] {
  try {
    validateConfig(raw);
  } catch (error) {
    if (error instanceof ConfigError) {
      return error.issues;
    }
    throw error;
  }
  return [];
}

describe('validateConfig', () => {
  it('maps the raw document to a typed config', () => {
    const config = validateConfig({ ...quotesConfig, delay_seconds: 0.5 });

    expect(config).toEqual({
      startUrl: 'https://quotes.example.test/',
      itemSelector: 'div.quote',
      fields: [
        ['text', { selector: 'span.text', multiple: false }],
        ['author', { selector: 'small.author', multiple: false }],
        ['tags', { selector: 'div.tags a.tag', multiple: true }]
      ],
      pagination: { nextPageSelector: 'li.next a', maxPages: 5 },
      delaySeconds: 0.5
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('applies defaults', () => {
    const { pagination: _pagination, ...single } = quotesConfig;
    const config = validateConfig(single);
    expect(config.pagination).toBeUndefined();
    expect(config.delaySeconds).toBe(0);

    const paged = validateConfig({ ...quotesConfig, pagination: { next_page_selector: 'li.next a' } });
    expect(paged.pagination).toEqual({ nextPageSelector: 'li.next a', maxPages: DEFAULT_MAX_PAGES });
  });

  it('accepts attr as an alias for attribute', () => {
    const config = validateConfig({
      ...quotesConfig,
      fields: { link: { selector: 'a', attr: 'href' }, image: { selector: 'img', attribute: 'src', attr: 'data-src' } }
    });
    expect(config.fields).toEqual([
      ['link', { selector: 'a', attribute: 'href', multiple: false }],
      ['image', { selector: 'img', attribute: 'src', multiple: false }]
    ]);
  });

  it('keeps field declaration order', () => {
    const config = validateConfig({
      ...quotesConfig,
      fields: { zeta: { selector: '.z' }, alpha: { selector: '.a' }, mid: { selector: '.m' } }
    });
    expect(fieldNames(config)).toEqual(['zeta', 'alpha', 'mid']);
  });

  it('reports missing required keys', () => {
    expect(issuesOf({})).toEqual(['start_url: Required', 'item_selector: Required', 'fields: Required']);
  });

  it('rejects empty fields', () => {
    expect(issuesOf({ ...quotesConfig, fields: {} })).toEqual(['fields: must define at least one field']);
  });

  it('rejects malformed selectors anywhere in the document', () => {
    const issues = issuesOf({
      ...quotesConfig,
      item_selector: '  ',
      fields: { text: { selector: 'span[' } },
      pagination: { next_page_selector: '<a>', max_pages: 2 }
    });
    expect(issues).toEqual([
      'item_selector: must not be empty',
      'fields.text.selector: is not a valid CSS selector',
      'pagination.next_page_selector: is not a valid CSS selector'
    ]);
  });

  it('rejects selectors with a dangling combinator or an empty name', () => {
    const issues = issuesOf({
      ...quotesConfig,
      item_selector: 'div.quote >',
      fields: { text: { selector: 'span.text' }, author: { selector: '..a' } }
    });
    expect(issues).toEqual([
      'item_selector: is not a valid CSS selector',
      'fields.author.selector: is not a valid CSS selector'
    ]);
  });

  it('keeps field names as written', () => {
    const config = validateConfig({ ...quotesConfig, fields: { ' Title ': { selector: 'h1' }, title: { selector: 'h2' } } });
    expect(fieldNames(config)).toEqual([' Title ', 'title']);
  });

  it('rejects field names that would merge or reorder columns', () => {
    expect(issuesOf({ ...quotesConfig, fields: { name: { selector: 'a' }, ' name': { selector: 'c' } } })).toEqual([
      'fields: " name" and "name" differ only in surrounding whitespace'
    ]);
    expect(issuesOf({ ...quotesConfig, fields: { text: { selector: 'p' }, '2024': { selector: 'b' } } })).toEqual([
      'fields.2024: field names must not be integers'
    ]);
    expect(issuesOf({ ...quotesConfig, fields: { ' ': { selector: 'p' } } })).toEqual([
      'fields. : field names must not be empty'
    ]);
    expect(issuesOf({ ...quotesConfig, fields: { '': { selector: 'p' } } })).toEqual([
      'fields."": field names must not be empty'
    ]);
  });

  it('rejects a __proto__ field name from parsed JSON', () => {
    const fields: unknown = JSON.parse('{"__proto__":{"selector":"a"},"x":{"selector":"b"}}');
    expect(issuesOf({ ...quotesConfig, fields })).toEqual(['fields.__proto__: field name is reserved']);
  });

  it('rejects invalid numbers and URLs', () => {
    expect(issuesOf({ ...quotesConfig, start_url: 'ftp://files.example.test/' })).toEqual(['start_url: must be an http(s) URL']);
    expect(issuesOf({ ...quotesConfig, delay_seconds: -1 })).toEqual(['delay_seconds: Number must be greater than or equal to 0']);
    expect(issuesOf({ ...quotesConfig, pagination: { next_page_selector: 'a', max_pages: 0 } })).toEqual([
      'pagination.max_pages: Number must be greater than 0'
    ]);
    expect(issuesOf({ ...quotesConfig, pagination: { next_page_selector: 'a', max_pages: 1.5 } })).toEqual([
      'pagination.max_pages: Expected integer, received float'
    ]);
  });

  it('rejects a document that is not an object', () => {
    expect(() => validateConfig('start_url=x')).toThrow(ConfigError);
  });
});
