import { describe, expect, it } from 'vitest';

import { buildSnapshot, formatQuoteLine } from '../../src/market/snapshot.js';
import type { QuoteResult } from '../../src/market/quotes.js';

describe('buildSnapshot', () => {
  const results: QuoteResult[] = [
    { symbol: 'NIFTY50', assetType: 'INDEX', price: 1234.5, source: 'fallback' },
    { symbol: 'NSE:RELIANCE', assetType: 'EQUITY', error: 'HTTP 503: down' },
    { symbol: 'MF:PPFAS', assetType: 'MF', price: null, source: 'live' },
  ];

  it('renders one line per result in input order', () => {
    expect(buildSnapshot(results)).toBe(
      'Market Snapshot:\n' +
        'NIFTY50 (INDEX): price=1234.5\n' +
        'NSE:RELIANCE (EQUITY): ERROR → HTTP 503: down\n' +
        'MF:PPFAS (MF): price=null\n' +
        '\n' +
        'Provide a BUY/SELL/HOLD for **each** symbol with a short reason.'
    );
  });

  it('is deterministic for the same input', () => {
    expect(buildSnapshot(results)).toBe(buildSnapshot([...results]));
  });

  it('keeps header and instruction when there are no results', () => {
    expect(buildSnapshot([])).toBe(
      'Market Snapshot:\n\n\nProvide a BUY/SELL/HOLD for **each** symbol with a short reason.'
    );
  });

  it('prefers the error rendering for failures', () => {
    expect(formatQuoteLine({ symbol: 'X', assetType: 'INDEX', error: 'timeout' })).toBe('X (INDEX): ERROR → timeout');
  });
});
