import type { BotConfig } from '../core/config.js';
import { describeError } from '../core/errors.js';
import { isJsonObject, requestJson } from '../core/http.js';
import { silentLogger, type PipelineLogger } from '../core/logger.js';
import type { AssetType, Instrument } from './classifier.js';

export type QuoteSource = 'live' | 'fallback';

export interface QuoteSuccess {
  readonly symbol: string;
  readonly assetType: AssetType;
  readonly price: number | null;
  readonly source: QuoteSource;
  readonly raw?: unknown;
}

export interface QuoteFailure {
  readonly symbol: string;
  readonly assetType: AssetType;
  readonly error: string;
}

export type QuoteResult = QuoteSuccess | QuoteFailure;

export interface QuoteProvider {
  fetch(instrument: Instrument): Promise<QuoteResult>;
}

export type QuoteFetcherConfig = Pick<BotConfig, 'quoteUrl' | 'accessToken' | 'requestTimeoutMs'>;

const PRIMARY_PRICE_FIELD = 'last_price';
const ALTERNATE_PRICE_FIELD = 'lp';

const FALLBACK_BASE = 1000;
const FALLBACK_SPAN = 600;

export function isQuoteFailure(result: QuoteResult): result is QuoteFailure {
  return 'error' in result;
}

/** 32-bit FNV-1a over the UTF-8 bytes of `text`. */
export function fnv1a32(text: string): number {
  let hash = 0x811c9dc5;
  for (const byte of Buffer.from(text, 'utf8')) {
    hash ^= byte;
    hash = Math.imul(hash, 0x01000193);
  }
  return hash >>> 0;
}

/**
 * Placeholder price used when no quote endpoint is configured, so a run
 * can go end to end without broker credentials. Stable across processes.
 */
export function fallbackPrice(token: string): number {
  const value = FALLBACK_BASE + (fnv1a32(token) % FALLBACK_SPAN);
  return Math.round(value * 100) / 100;
}

function toPrice(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/** `lp` is consulted only when `last_price` is absent from the body. */
export function extractPrice(body: Record<string, unknown>): number | null {
  if (Object.hasOwn(body, PRIMARY_PRICE_FIELD)) {
    return toPrice(body[PRIMARY_PRICE_FIELD]);
  }
  return toPrice(body[ALTERNATE_PRICE_FIELD]);
}

export class QuoteFetcher implements QuoteProvider {
  constructor(
    private readonly config: QuoteFetcherConfig,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  get live(): boolean {
    return Boolean(this.config.quoteUrl && this.config.accessToken);
  }

  async fetch(instrument: Instrument): Promise<QuoteResult> {
    const base = { symbol: instrument.token, assetType: instrument.assetType };
    if (!this.live) {
      return { ...base, price: fallbackPrice(instrument.token), source: 'fallback' };
    }

    try {
      const result = await requestJson({
        method: 'GET',
        url: this.config.quoteUrl,
        token: this.config.accessToken ?? '',
        timeoutMs: this.config.requestTimeoutMs,
        query: { symbol: instrument.key, type: instrument.assetType },
      });
      if (!result.ok) {
        this.logger.warn(`Quote fetch failed for ${instrument.token}: ${result.error}`);
        return { ...base, error: result.error };
      }
      if (!isJsonObject(result.body)) {
        return { ...base, error: 'Unexpected quote response shape' };
      }
      return { ...base, price: extractPrice(result.body), source: 'live', raw: result.body };
    } catch (error) {
      const message = describeError(error);
      this.logger.warn(`Quote fetch failed for ${instrument.token}: ${message}`);
      return { ...base, error: message };
    }
  }

  async fetchAll(instruments: readonly Instrument[]): Promise<QuoteResult[]> {
    const results: QuoteResult[] = [];
    for (const instrument of instruments) {
      results.push(await this.fetch(instrument));
    }
    return results;
  }
}
