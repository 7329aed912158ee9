import type { BotConfigInput } from '../core/config.js';

export interface RunCommandOptions {
  config?: string;
  symbols?: string;
  live?: boolean;
  dryRun?: boolean;
  journal?: string;
  logLevel?: string;
}

/** Maps CLI flags onto config overrides; unset flags leave env/file values alone. */
export function toConfigOverrides(options: RunCommandOptions): Partial<BotConfigInput> {
  if (options.live && options.dryRun) {
    throw new Error('--live and --dry-run cannot be combined');
  }
  const overrides: Partial<BotConfigInput> = {};
  if (options.symbols !== undefined) overrides.symbols = options.symbols;
  if (options.live) overrides.dryRun = false;
  if (options.dryRun) overrides.dryRun = true;
  if (options.journal !== undefined) overrides.journalPath = options.journal;
  if (options.logLevel !== undefined) overrides.logLevel = options.logLevel;
  return overrides;
}
