import { buildOrderPayload, OrderGateway, type OrderResponse, type OrderSubmitter } from '../execution/order_gateway.js';
import { classifyInstrument, type Instrument } from '../market/classifier.js';
import { QuoteFetcher, type QuoteProvider, type QuoteResult } from '../market/quotes.js';
import { buildSnapshot } from '../market/snapshot.js';
import { RunJournal, type JournalSink, type RunRecord } from '../memory/run_journal.js';
import { createOracleClient, isOracleFailure, oracleFailure, type Oracle } from '../oracle/client.js';
import { DEFAULT_SYSTEM_DIRECTIVE, loadSystemDirective } from '../oracle/directive.js';
import { parseSignal, type Signal } from '../oracle/signal.js';
import type { BotConfig } from './config.js';
import { describeError } from './errors.js';
import { silentLogger, type PipelineLogger } from './logger.js';

export interface PipelineDependencies {
  logger?: PipelineLogger;
  quotes?: QuoteProvider;
  oracle?: Oracle;
  orders?: OrderSubmitter;
  journal?: JournalSink;
  loadDirective?: (path: string) => string;
  now?: () => Date;
}

export interface RunOutcome {
  record: RunRecord;
  instruments: Instrument[];
  quotes: QuoteResult[];
  journaled: boolean;
}

/**
 * Runs `task`; if it throws, logs and returns `fallback(error)` instead.
 * Stages are written not to throw, but injected collaborators may.
 */
async function stage<T>(
  name: string,
  logger: PipelineLogger,
  task: () => T | Promise<T>,
  fallback: (detail: string) => T
): Promise<T> {
  try {
    return await task();
  } catch (error) {
    const detail = describeError(error);
    logger.error(`Stage ${name} failed: ${detail}`);
    return fallback(detail);
  }
}

export async function runPipeline(config: BotConfig, deps: PipelineDependencies = {}): Promise<RunOutcome> {
  const logger = deps.logger ?? silentLogger;
  const now = deps.now ?? (() => new Date());
  const quotes = deps.quotes ?? new QuoteFetcher(config, logger);
  const oracle = deps.oracle ?? createOracleClient(config, logger);
  const orders = deps.orders ?? new OrderGateway(config, logger);
  const journal = deps.journal ?? new RunJournal(config.journalPath, logger);
  const loadDirective = deps.loadDirective ?? ((path: string) => loadSystemDirective(path, logger));

  const startedAt = now();
  const symbols = [...config.symbols];
  const instruments = symbols.map(classifyInstrument);
  logger.info(`Run started for ${symbols.length} instrument(s): ${symbols.join(', ')}`);

  const directive = await stage('directive', logger, () => loadDirective(config.directivePath), () => DEFAULT_SYSTEM_DIRECTIVE);

  const quoteResults: QuoteResult[] = [];
  for (const instrument of instruments) {
    quoteResults.push(
      await stage(
        `quote ${instrument.token}`,
        logger,
        () => quotes.fetch(instrument),
        (detail): QuoteResult => ({ symbol: instrument.token, assetType: instrument.assetType, error: detail })
      )
    );
  }

  const snapshot = buildSnapshot(quoteResults);
  logger.debug('Snapshot built', snapshot);

  const reply = await stage('oracle', logger, () => oracle.ask(directive, snapshot), oracleFailure);
  // Failure details are free text and must not yield a tradable keyword.
  const signal: Signal = isOracleFailure(reply) ? 'UNKNOWN' : parseSignal(reply);
  logger.info(`Oracle signal: ${signal}`);

  const payload = buildOrderPayload(symbols[0] ?? '', signal, reply, now());
  const orderResponse = await stage<OrderResponse>(
    'order',
    logger,
    () => orders.submit(payload),
    (detail) => ({ status: 'error', detail })
  );

  const record: RunRecord = {
    time: startedAt.toISOString(),
    symbols,
    snapshot,
    signal_text: reply,
    parsed_signal: signal,
    order_response: orderResponse,
  };
  const journaled = await stage('journal', logger, () => journal.append(record), () => false);

  return { record, instruments, quotes: quoteResults, journaled };
}
