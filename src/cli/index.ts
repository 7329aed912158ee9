#!/usr/bin/env node
/**
 * signalbot CLI
 *
 * Runs the quote → oracle → order → journal pipeline once and exits.
 */

import 'dotenv/config';

import { Command } from 'commander';

import { VERSION } from '../index.js';
import { loadConfig } from '../core/config.js';
import { Logger } from '../core/logger.js';
import { runPipeline } from '../core/pipeline.js';
import { formatRunSummary } from '../core/summary.js';
import { toConfigOverrides, type RunCommandOptions } from './run_command.js';

const program = new Command();

program
  .name('signalbot')
  .description('Scheduled market signal pipeline backed by a language-model oracle')
  .version(VERSION);

program
  .command('run', { isDefault: true })
  .description('Run the pipeline once and append the run to the journal')
  .option('-c, --config <path>', 'YAML config file')
  .option('-s, --symbols <list>', 'Comma-separated instruments (overrides SYMBOLS)')
  .option('--live', 'Submit the order to the order endpoint')
  .option('--dry-run', 'Never submit orders (default)')
  .option('-j, --journal <path>', 'Journal file (overrides LOG_FILE)')
  .option('--log-level <level>', 'debug | info | warn | error')
  .action(async (options: RunCommandOptions) => {
    const config = loadConfig({ configPath: options.config, overrides: toConfigOverrides(options) });
    const logger = new Logger(config.logLevel);
    const outcome = await runPipeline(config, { logger });
    if (!outcome.journaled) {
      logger.warn(`Run was not journaled to ${config.journalPath}`);
    }
    console.log(formatRunSummary(outcome.record));
  });

program.parseAsync(process.argv).catch((error: unknown) => {
  console.error('signalbot failed to start', error);
  process.exit(1);
});
