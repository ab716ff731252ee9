import Table from 'cli-table3';
import type { ResultSet } from '../types.js';

export interface FieldFill {
  field: string;
  filled: number;
  empty: number;
}

export function summarizeFields(records: ResultSet, columns: readonly string[]): FieldFill[] {
  return columns.map(field => {
    const filled = records.filter(record => {
      const value = record[field];
      return Array.isArray(value) ? value.length > 0 : Boolean(value);
    }).length;
    return { field, filled, empty: records.length - filled };
  });
}

export function renderSummaryTable(records: ResultSet, columns: readonly string[]): string {
  const table = new Table({
    head: ['Field', 'Filled', 'Empty'],
    style: { head: ['cyan'], border: ['grey'] }
  });
  for (const row of summarizeFields(records, columns)) {
    table.push([row.field, String(row.filled), String(row.empty)]);
  }
  return table.toString();
}
