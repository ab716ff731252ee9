export interface FieldSpec {
  selector: string;
  /** Attribute to read; text content is used when absent. */
  attribute?: string;
  multiple: boolean;
}

export interface PaginationSpec {
  nextPageSelector: string;
  maxPages: number;
}

export interface ScrapeConfig {
  startUrl: string;
  itemSelector: string;
  /** Declaration order drives record key order and CSV column order. */
  fields: ReadonlyArray<readonly [string, FieldSpec]>;
  pagination?: PaginationSpec;
  delaySeconds: number;
}

export type FieldValue = string | string[];

export type ScrapeRecord = Readonly<Record<string, FieldValue>>;

export type ResultSet = readonly ScrapeRecord[];

export interface ScraperSettings {
  userAgent: string;
  requestTimeoutMs: number;
}
