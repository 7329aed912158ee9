import { isQuoteFailure, type QuoteResult } from './quotes.js';

export const SNAPSHOT_HEADER = 'Market Snapshot:';
export const SNAPSHOT_INSTRUCTION = 'Provide a BUY/SELL/HOLD for **each** symbol with a short reason.';

export function formatQuoteLine(result: QuoteResult): string {
  if (isQuoteFailure(result)) {
    return `${result.symbol} (${result.assetType}): ERROR → ${result.error}`;
  }
  return `${result.symbol} (${result.assetType}): price=${result.price ?? 'null'}`;
}

export function buildSnapshot(results: readonly QuoteResult[]): string {
  const lines = results.map(formatQuoteLine);
  return `${SNAPSHOT_HEADER}\n${lines.join('\n')}\n\n${SNAPSHOT_INSTRUCTION}`;
}
