import fs from 'fs/promises';
import path from 'path';
import { isMissingFileError } from './errors.js';
import { isLogLevel } from './logger.js';
import type { LogLevel } from './logger.js';
import { DEFAULT_TIMEOUT_MS, DEFAULT_USER_AGENT } from './scraper/fetcher.js';
import type { ScraperSettings } from './types.js';

export type EnvSource = Readonly<Record<string, string | undefined>>;

export interface EnvSettings extends ScraperSettings {
  logLevel: LogLevel;
}

const ASSIGNMENT = /^(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=\s*(.*)$/;
const QUOTED = /^(["'])(.*)\1$/;

/** `KEY=value` pairs from a dotenv document; comments and malformed lines are skipped. */
export function parseEnvFile(content: string): Record<string, string> {
  const entries: Record<string, string> = {};
  for (const line of content.split(/\r?\n/)) {
    const match = ASSIGNMENT.exec(line.trim());
    if (!match) {
      continue;
    }
    const [, key, rawValue] = match;
    const value = rawValue.trim();
    entries[key] = QUOTED.exec(value)?.[2] ?? value;
  }
  return entries;
}

/** Reads `.env`; a missing file is an empty source. */
export async function readEnvFile(envPath = path.join(process.cwd(), '.env')): Promise<Record<string, string>> {
  try {
    return parseEnvFile(await fs.readFile(envPath, 'utf-8'));
  } catch (error) {
    if (isMissingFileError(error)) {
      return {};
    }
    throw error;
  }
}

/**
 * Resolves scraper settings from the given sources in priority order; the
 * first non-blank value for a key wins.
 */
export function readScraperSettings(...sources: EnvSource[]): EnvSettings {
  const lookup = (key: string): string =>
    (sources.length > 0 ? sources : [process.env]).map(source => source[key]?.trim() ?? '').find(Boolean) ?? '';

  const timeout = Number.parseInt(lookup('SCRAPER_TIMEOUT_MS'), 10);
  const level = lookup('LOG_LEVEL').toLowerCase();
  return {
    userAgent: lookup('SCRAPER_USER_AGENT') || DEFAULT_USER_AGENT,
    requestTimeoutMs: Number.isFinite(timeout) && timeout > 0 ? timeout : DEFAULT_TIMEOUT_MS,
    logLevel: isLogLevel(level) ? level : 'info'
  };
}

/** Settings from the process environment, falling back to `.env`. */
export async function loadScraperSettings(envPath?: string): Promise<EnvSettings> {
  return readScraperSettings(process.env, await readEnvFile(envPath));
}
