export type Signal = 'BUY' | 'SELL' | 'HOLD' | 'UNKNOWN';

// Priority order: a reply mentioning both BUY and SELL resolves to BUY.
const SIGNAL_KEYWORDS = ['BUY', 'SELL', 'HOLD'] as const;

export function parseSignal(text: string): Signal {
  const upper = text.toUpperCase();
  return SIGNAL_KEYWORDS.find((keyword) => upper.includes(keyword)) ?? 'UNKNOWN';
}
