import { appendFileSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';

import { describeError } from '../core/errors.js';
import { silentLogger, type PipelineLogger } from '../core/logger.js';
import type { OrderResponse } from '../execution/order_gateway.js';
import type { Signal } from '../oracle/signal.js';

export interface RunRecord {
  time: string;
  symbols: string[];
  snapshot: string;
  signal_text: string;
  parsed_signal: Signal;
  order_response: OrderResponse;
}

export interface JournalSink {
  append(record: RunRecord): boolean;
}

/**
 * Newline-delimited JSON audit log, one line per run. The file is opened
 * and closed on every write; nothing is held between runs.
 */
export class RunJournal implements JournalSink {
  constructor(
    readonly filePath: string,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  append(record: RunRecord): boolean {
    try {
      mkdirSync(dirname(this.filePath), { recursive: true });
      appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, 'utf8');
      return true;
    } catch (error) {
      // Reported, never thrown.
      this.logger.warn(`Run journal write failed (${this.filePath}): ${describeError(error)}`);
      return false;
    }
  }
}
