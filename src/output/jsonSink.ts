import fs from 'fs/promises';
import path from 'path';
import type { ResultSet } from '../types.js';

/** Writes the records as a pretty-printed JSON array; multi-valued fields stay arrays. */
export async function writeJson(records: ResultSet, filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await fs.writeFile(filePath, `${JSON.stringify(records, null, 2)}\n`, 'utf-8');
}
