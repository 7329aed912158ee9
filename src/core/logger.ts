import { format } from 'node:util';

export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

/**
 * The slice of a logger the pipeline stages depend on. Tests hand in
 * `vi.fn()` stubs; the CLI hands in a {@link Logger}.
 */
export interface PipelineLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

function serializeLine(level: LogLevel, message: string, meta: unknown): string {
  const text = meta === undefined ? message : format('%s %O', message, meta);
  return `[${new Date().toISOString()}] ${level.toUpperCase()}: ${text}`;
}

export class Logger implements PipelineLogger {
  private readonly threshold: number;

  constructor(level: LogLevel = 'info') {
    this.threshold = LOG_LEVELS.indexOf(level);
  }

  debug(message: string, meta?: unknown): void {
    if (this.enabled('debug')) console.debug(serializeLine('debug', message, meta));
  }

  info(message: string, meta?: unknown): void {
    if (this.enabled('info')) console.log(serializeLine('info', message, meta));
  }

  warn(message: string, meta?: unknown): void {
    if (this.enabled('warn')) console.warn(serializeLine('warn', message, meta));
  }

  error(message: string, meta?: unknown): void {
    if (this.enabled('error')) console.error(serializeLine('error', message, meta));
  }

  private enabled(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= this.threshold;
  }
}

export const silentLogger: PipelineLogger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
