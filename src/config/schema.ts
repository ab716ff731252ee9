import { z } from 'zod';
import { ConfigError } from '../errors.js';
import { isValidSelector } from '../scraper/selectorResolver.js';
import type { FieldSpec, PaginationSpec, ScrapeConfig } from '../types.js';

/** Page ceiling applied when pagination is configured without `max_pages`. */
export const DEFAULT_MAX_PAGES = 100;

const selectorSchema = z
  .string()
  .trim()
  .min(1, 'must not be empty')
  .refine(value => value === '' || isValidSelector(value), { message: 'is not a valid CSS selector' });

const fieldSpecSchema = z.object({
  selector: selectorSchema,
  attribute: z.string().trim().min(1).optional(),
  // older config files spell it `attr`
  attr: z.string().trim().min(1).optional(),
  multiple: z.boolean().default(false)
});

// integer-like keys are enumerated before all others, which would reorder the columns
const ARRAY_INDEX_KEY = /^(0|[1-9]\d*)$/;

const fieldNameSchema = z
  .string()
  .refine(name => name.trim() !== '', { message: 'field names must not be empty' })
  .refine(name => name !== '__proto__', { message: 'field name is reserved' })
  .refine(name => !ARRAY_INDEX_KEY.test(name), { message: 'field names must not be integers' });

const paginationSchema = z.object({
  next_page_selector: selectorSchema,
  max_pages: z.number().int().positive().default(DEFAULT_MAX_PAGES)
});

export const scrapeConfigSchema = z.object({
  start_url: z
    .string()
    .url()
    .refine(value => /^https?:\/\//i.test(value), { message: 'must be an http(s) URL' }),
  item_selector: selectorSchema,
  fields: z
    .record(fieldNameSchema, fieldSpecSchema)
    .refine(fields => Object.keys(fields).length > 0, { message: 'must define at least one field' })
    .superRefine((fields, ctx) => {
      const seen = new Map<string, string>();
      for (const name of Object.keys(fields)) {
        const other = seen.get(name.trim());
        if (other !== undefined) {
          ctx.addIssue({
            code: z.ZodIssueCode.custom,
            message: `"${name}" and "${other}" differ only in surrounding whitespace`
          });
        }
        seen.set(name.trim(), name);
      }
    }),
  pagination: paginationSchema.optional(),
  delay_seconds: z.number().finite().nonnegative().default(0)
});

export type RawScrapeConfig = z.input<typeof scrapeConfigSchema>;

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.map(part => (part === '' ? '""' : part)).join('.') : '(root)';
  return `${location}: ${issue.message}`;
}

function toFieldSpec(spec: z.output<typeof fieldSpecSchema>): FieldSpec {
  const fieldSpec: FieldSpec = { selector: spec.selector, multiple: spec.multiple };
  const attribute = spec.attribute ?? spec.attr;
  if (attribute) {
    fieldSpec.attribute = attribute;
  }
  return Object.freeze(fieldSpec);
}

/**
 * Validates a raw configuration document into an immutable {@link ScrapeConfig}.
 * Throws {@link ConfigError} listing every problem found.
 */
export function validateConfig(raw: unknown): ScrapeConfig {
  const parsed = scrapeConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigError('Invalid scrape configuration', parsed.error.issues.map(formatIssue));
  }

  const data = parsed.data;
  const fields = Object.entries(data.fields).map(([name, spec]) => Object.freeze([name, toFieldSpec(spec)] as const));
  const pagination: PaginationSpec | undefined = data.pagination
    ? Object.freeze({ nextPageSelector: data.pagination.next_page_selector, maxPages: data.pagination.max_pages })
    : undefined;

  return Object.freeze({
    startUrl: data.start_url,
    itemSelector: data.item_selector,
    fields: Object.freeze(fields),
    pagination,
    delaySeconds: data.delay_seconds
  });
}

export function fieldNames(config: Pick<ScrapeConfig, 'fields'>): string[] {
  return config.fields.map(([name]) => name);
}
