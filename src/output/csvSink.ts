import { createObjectCsvWriter } from 'csv-writer';
import fs from 'fs/promises';
import path from 'path';
import type { FieldValue, ResultSet } from '../types.js';

export const MULTI_VALUE_SEPARATOR = ', ';

export function flattenValue(value: FieldValue): string {
  return Array.isArray(value) ? value.join(MULTI_VALUE_SEPARATOR) : value;
}

export function toCsvRow(record: ResultSet[number], columns: readonly string[]): Record<string, string> {
  const row: Record<string, string> = {};
  for (const column of columns) {
    row[column] = flattenValue(record[column] ?? '');
  }
  return row;
}

/**
 * One row per record, columns in field declaration order. Multi-valued
 * fields are joined with `", "`. An empty result still gets a header row.
 */
export async function writeCsv(records: ResultSet, columns: readonly string[], filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  const csvWriter = createObjectCsvWriter({
    path: filePath,
    header: columns.map(column => ({ id: column, title: column }))
  });
  await csvWriter.writeRecords(records.map(record => toCsvRow(record, columns)));
}
