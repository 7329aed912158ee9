export type AssetType = 'INDEX' | 'EQUITY' | 'OPTION' | 'ETF' | 'MF';

export interface Instrument {
  readonly token: string;
  readonly assetType: AssetType;
  readonly key: string;
}

// Checked in order before the colon rule, so `OPTION:NSE:X` stays an option.
const PREFIX_TYPES: ReadonlyArray<readonly [prefix: string, assetType: AssetType]> = [
  ['OPTION:', 'OPTION'],
  ['ETF:', 'ETF'],
  ['MF:', 'MF'],
];

export function classifyInstrument(token: string): Instrument {
  const upper = token.toUpperCase();
  for (const [prefix, assetType] of PREFIX_TYPES) {
    if (upper.startsWith(prefix)) {
      return { token, assetType, key: token.slice(prefix.length) };
    }
  }
  // The colon is an exchange-segment delimiter (NSE:RELIANCE); the key keeps it.
  if (token.includes(':')) {
    return { token, assetType: 'EQUITY', key: token };
  }
  return { token, assetType: 'INDEX', key: token };
}

/** Splits a comma-separated instrument list, dropping blank entries. */
export function parseInstrumentList(raw: string | readonly string[]): string[] {
  const parts = typeof raw === 'string' ? raw.split(',') : raw;
  return parts.map((part) => part.trim()).filter((part) => part.length > 0);
}
