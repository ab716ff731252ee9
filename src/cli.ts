#!/usr/bin/env node

import chalk from 'chalk';
import ora from 'ora';
import { applyOverrides, parseArgs, USAGE } from './cliArgs.js';
import { fieldNames } from './config/schema.js';
import { readConfigFile } from './config/loadConfig.js';
import { loadScraperSettings } from './env.js';
import { ConfigError, describeError } from './errors.js';
import { createSilentLogger, Logger } from './logger.js';
import { exportResultSet } from './output/exporter.js';
import { renderSummaryTable } from './output/summary.js';
import { scrape } from './scraper/index.js';

async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));
  if (options.help) {
    console.log(USAGE);
    return;
  }
  if (!options.configPath) {
    throw new ConfigError(`Missing required --config <file>\n\n${USAGE}`);
  }

  const settings = await loadScraperSettings();
  const logger = new Logger(options.verbose ? 'debug' : settings.logLevel);

  const raw = applyOverrides(await readConfigFile(options.configPath), options, logger);

  const controller = new AbortController();
  const onSigint = () => {
    logger.warn('Interrupted; stopping after the current step. No output will be written.');
    controller.abort();
  };
  process.once('SIGINT', onSigint);

  try {
    const { config, records, pagesFetched } = await scrape(raw, {
      settings,
      signal: controller.signal,
      logger
    });

    const columns = fieldNames(config);
    if (records.length === 0) {
      logger.warn('No records scraped; CSV will only contain the header row.');
    }

    const spinner = ora('Writing JSON and CSV...').start();
    try {
      const paths = await exportResultSet(records, columns, options.outputBase, createSilentLogger());
      spinner.succeed(chalk.green(`Exported ${records.length} records from ${pagesFetched} page(s)`));
      console.log(`  ${chalk.dim('JSON')} ${paths.jsonPath}`);
      console.log(`  ${chalk.dim('CSV ')} ${paths.csvPath}`);
    } catch (error) {
      spinner.fail(chalk.red('Export failed'));
      throw error;
    }

    console.log(renderSummaryTable(records, columns));
  } finally {
    process.removeListener('SIGINT', onSigint);
  }
}

main().catch(error => {
  if (error instanceof ConfigError) {
    console.error(chalk.red(error.message));
  } else {
    console.error(chalk.red(`Scrape failed: ${describeError(error)}`));
  }
  process.exitCode = 1;
});
