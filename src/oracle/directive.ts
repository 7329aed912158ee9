import { readFileSync } from 'node:fs';

import { describeError } from '../core/errors.js';
import { silentLogger, type PipelineLogger } from '../core/logger.js';

export const DEFAULT_SYSTEM_DIRECTIVE =
  'You are an expert Indian financial market analyst. ' +
  'Analyze Index, Stocks, Options, ETFs, Mutual Funds and provide BUY/SELL/HOLD.';

/** Reads the oracle's system directive, falling back to the built-in text. */
export function loadSystemDirective(path: string, logger: PipelineLogger = silentLogger): string {
  try {
    const text = readFileSync(path, 'utf-8');
    if (text.trim()) return text;
    logger.warn(`System directive at ${path} is empty; using built-in directive`);
  } catch (error) {
    logger.warn(`System directive unavailable (${describeError(error)}); using built-in directive`);
  }
  return DEFAULT_SYSTEM_DIRECTIVE;
}
