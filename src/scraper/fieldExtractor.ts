import type { Cheerio } from 'cheerio';
import type { Element } from 'domhandler';
import type { FieldSpec, FieldValue, ScrapeConfig, ScrapeRecord } from '../types.js';
import { readAttribute, readText, select } from './selectorResolver.js';

function readValue(element: Cheerio<Element>, spec: FieldSpec): string {
  if (spec.attribute) {
    return readAttribute(element, spec.attribute) ?? '';
  }
  return readText(element);
}

export function extractField(item: Cheerio<Element>, spec: FieldSpec): FieldValue {
  const matches = select(item, spec.selector);
  if (spec.multiple) {
    return matches.map(element => readValue(element, spec));
  }
  const first = matches[0];
  return first ? readValue(first, spec) : '';
}

/**
 * Builds one record from an item block. Every configured field is present;
 * a selector that matches nothing yields `''` or `[]`.
 */
export function extractRecord(item: Cheerio<Element>, fields: ScrapeConfig['fields']): ScrapeRecord {
  const record: Record<string, FieldValue> = {};
  for (const [name, spec] of fields) {
    record[name] = extractField(item, spec);
  }
  return record;
}
