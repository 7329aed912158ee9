import type { BotConfig } from '../core/config.js';
import { describeError } from '../core/errors.js';
import { requestJson, type JsonValue } from '../core/http.js';
import { silentLogger, type PipelineLogger } from '../core/logger.js';
import type { Signal } from '../oracle/signal.js';

export interface OrderPayload {
  primary_symbol: string;
  signal: Signal;
  reason: string;
  timestamp: number;
}

export interface DryRunOrderResponse {
  status: 'dry_run';
  detail: string;
  payload: OrderPayload;
}

export interface FailedOrderResponse {
  status: 'error';
  detail: string;
}

/** Whatever JSON the brokerage answered, passed through untouched. */
export type BrokerOrderResponse = JsonValue;

export type OrderResponse = DryRunOrderResponse | FailedOrderResponse | BrokerOrderResponse;

export interface OrderSubmitter {
  submit(payload: OrderPayload): Promise<OrderResponse>;
}

export type OrderGatewayConfig = Pick<BotConfig, 'dryRun' | 'orderUrl' | 'accessToken' | 'requestTimeoutMs'>;

export const DRY_RUN_DETAIL = 'order not executed';
export const MISSING_CREDENTIALS_DETAIL = 'missing endpoint or credential';

export function buildOrderPayload(
  primarySymbol: string,
  signal: Signal,
  reason: string,
  now: Date
): OrderPayload {
  return {
    primary_symbol: primarySymbol,
    signal,
    reason,
    timestamp: Math.floor(now.getTime() / 1000),
  };
}

export class OrderGateway implements OrderSubmitter {
  constructor(
    private readonly config: OrderGatewayConfig,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  async submit(payload: OrderPayload): Promise<OrderResponse> {
    if (this.config.dryRun) {
      return { status: 'dry_run', detail: DRY_RUN_DETAIL, payload };
    }

    const { orderUrl, accessToken } = this.config;
    if (!orderUrl || !accessToken) {
      this.logger.warn('Live order skipped: order endpoint or access token not configured');
      return { status: 'error', detail: MISSING_CREDENTIALS_DETAIL };
    }

    try {
      const result = await requestJson({
        method: 'POST',
        url: orderUrl,
        token: accessToken,
        timeoutMs: this.config.requestTimeoutMs,
        body: payload,
      });
      if (!result.ok) {
        this.logger.error(`Order submission failed for ${payload.primary_symbol}: ${result.error}`);
        return { status: 'error', detail: result.error };
      }
      this.logger.info(`Order submitted for ${payload.primary_symbol} (${payload.signal})`);
      return result.body;
    } catch (error) {
      return { status: 'error', detail: describeError(error) };
    }
  }
}
