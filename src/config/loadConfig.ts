import fs from 'fs/promises';
import path from 'path';
import { ConfigError, describeError, isMissingFileError } from '../errors.js';
import type { ScrapeConfig } from '../types.js';
import { validateConfig } from './schema.js';

export async function readConfigFile(configPath: string): Promise<unknown> {
  const resolved = path.resolve(configPath);
  let content: string;
  try {
    content = await fs.readFile(resolved, 'utf-8');
  } catch (error) {
    if (isMissingFileError(error)) {
      throw new ConfigError(`Config file not found: ${resolved}`, [], { cause: error });
    }
    throw new ConfigError(`Unable to read config file ${resolved}: ${describeError(error)}`, [], { cause: error });
  }

  try {
    return JSON.parse(content);
  } catch (error) {
    throw new ConfigError(`Config file is not valid JSON: ${resolved} (${describeError(error)})`, [], { cause: error });
  }
}

export async function loadConfigFile(configPath: string): Promise<ScrapeConfig> {
  return validateConfig(await readConfigFile(configPath));
}
