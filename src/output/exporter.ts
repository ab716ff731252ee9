import fs from 'fs/promises';
import path from 'path';
import { Logger } from '../logger.js';
import type { ResultSet } from '../types.js';
import { writeCsv } from './csvSink.js';
import { writeJson } from './jsonSink.js';

export interface ExportPaths {
  jsonPath: string;
  csvPath: string;
}

/** `output/data` -> `output/data.json` + `output/data.csv`; an existing extension is replaced. */
export function resolveExportPaths(outputBase: string): ExportPaths {
  const parsed = path.parse(path.resolve(outputBase));
  const base = path.join(parsed.dir, parsed.name);
  return { jsonPath: `${base}.json`, csvPath: `${base}.csv` };
}

function stagingPath(finalPath: string): string {
  return `${finalPath}.${process.pid}.partial`;
}

/**
 * Writes both sinks. Files are staged and only moved into place once both
 * writes succeeded, so a failed export leaves no output behind.
 */
export async function exportResultSet(
  records: ResultSet,
  columns: readonly string[],
  outputBase: string,
  logger: Logger = new Logger()
): Promise<ExportPaths> {
  const { jsonPath, csvPath } = resolveExportPaths(outputBase);
  const stagedJson = stagingPath(jsonPath);
  const stagedCsv = stagingPath(csvPath);

  const leftovers = [stagedJson, stagedCsv];
  try {
    await writeJson(records, stagedJson);
    await writeCsv(records, columns, stagedCsv);
    await fs.rename(stagedJson, jsonPath);
    leftovers.push(jsonPath);
    await fs.rename(stagedCsv, csvPath);
  } catch (error) {
    await Promise.all(leftovers.map(file => fs.rm(file, { force: true })));
    throw error;
  }

  logger.info(`Saved JSON: ${jsonPath}`);
  logger.info(`Saved CSV: ${csvPath}`);
  return { jsonPath, csvPath };
}
