import type { FieldValue, ResultSet, ScrapeRecord } from '../types.js';

function freezeRecord(record: ScrapeRecord): ScrapeRecord {
  const copy: Record<string, FieldValue> = {};
  for (const [key, value] of Object.entries(record)) {
    if (Array.isArray(value)) {
      const items = [...value];
      Object.freeze(items);
      copy[key] = items;
    } else {
      copy[key] = value;
    }
  }
  return Object.freeze(copy);
}

/** Append-only, crawl-ordered record store for one run. */
export class ResultAggregator {
  private records: ScrapeRecord[] = [];

  append(records: readonly ScrapeRecord[]): void {
    for (const record of records) {
      this.records.push(freezeRecord(record));
    }
  }

  get size(): number {
    return this.records.length;
  }

  toResultSet(): ResultSet {
    return Object.freeze([...this.records]);
  }
}
