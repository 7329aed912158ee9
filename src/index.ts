/**
 * oracle-signal-bot
 *
 * One-shot pipeline: quotes → oracle recommendation → signal → optional
 * order → journal line. Meant to be triggered by an external scheduler.
 */

export const VERSION = '0.1.0';

export { loadConfig, type BotConfig, type BotConfigInput } from './core/config.js';
export { Logger, type LogLevel, type PipelineLogger } from './core/logger.js';
export { runPipeline, type PipelineDependencies, type RunOutcome } from './core/pipeline.js';
export { formatRunSummary } from './core/summary.js';
export { classifyInstrument, parseInstrumentList, type AssetType, type Instrument } from './market/classifier.js';
export { QuoteFetcher, fallbackPrice, type QuoteResult } from './market/quotes.js';
export { buildSnapshot } from './market/snapshot.js';
export { OracleClient, createOracleClient, ORACLE_ERROR_MARKER, type CompletionTransport } from './oracle/client.js';
export { parseSignal, type Signal } from './oracle/signal.js';
export { OrderGateway, buildOrderPayload, type OrderPayload, type OrderResponse } from './execution/order_gateway.js';
export { RunJournal, type RunRecord } from './memory/run_journal.js';
