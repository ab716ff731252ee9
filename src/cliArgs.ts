import { ConfigError } from './errors.js';
import type { Logger } from './logger.js';

export interface CliOptions {
  configPath?: string;
  outputBase: string;
  delaySeconds?: number;
  maxPages?: number;
  verbose: boolean;
  help: boolean;
}

export const DEFAULT_OUTPUT_BASE = 'output/data';

export const USAGE = `Usage: config-scraper --config <file> [options]

Options:
  -c, --config <file>        Path to JSON config file (required)
  -o, --output-base <path>   Base path for output files, without extension (default: ${DEFAULT_OUTPUT_BASE})
      --delay <seconds>      Override delay_seconds from the config
      --max-pages <n>        Override pagination.max_pages from the config
      --verbose              Debug logging
  -h, --help                 Show this help`;

function parseNumber(flag: string, value: string | undefined): number {
  const parsed = value === undefined || value.trim() === '' ? Number.NaN : Number(value);
  if (!Number.isFinite(parsed)) {
    throw new ConfigError(`${flag} expects a number, got "${value ?? ''}"`);
  }
  return parsed;
}

export function parseArgs(args: string[]): CliOptions {
  const options: CliOptions = { outputBase: DEFAULT_OUTPUT_BASE, verbose: false, help: false };
  for (let i = 0; i < args.length; i += 1) {
    const arg = args[i];
    const next = args[i + 1];
    if ((arg === '--config' || arg === '-c') && next) {
      options.configPath = next;
      i += 1;
    } else if ((arg === '--output-base' || arg === '-o') && next) {
      options.outputBase = next;
      i += 1;
    } else if (arg === '--delay') {
      options.delaySeconds = parseNumber(arg, next);
      i += 1;
    } else if (arg === '--max-pages') {
      options.maxPages = parseNumber(arg, next);
      i += 1;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else if (arg === '--help' || arg === '-h') {
      options.help = true;
    } else {
      throw new ConfigError(`Unknown or incomplete argument: ${arg}`);
    }
  }
  return options;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Layers command-line overrides onto the raw config document. Values are
 * validated together with the rest of the document afterwards.
 */
export function applyOverrides(
  raw: unknown,
  options: Pick<CliOptions, 'delaySeconds' | 'maxPages'>,
  logger?: Pick<Logger, 'warn'>
): unknown {
  if (!isRecord(raw)) {
    return raw;
  }
  const merged: Record<string, unknown> = { ...raw };
  if (options.delaySeconds !== undefined) {
    merged.delay_seconds = options.delaySeconds;
  }
  if (options.maxPages !== undefined) {
    if (isRecord(raw.pagination)) {
      merged.pagination = { ...raw.pagination, max_pages: options.maxPages };
    } else {
      logger?.warn('--max-pages ignored: the config has no pagination section');
    }
  }
  return merged;
}
