import OpenAI from 'openai';

import type { BotConfig } from '../core/config.js';
import { describeError, withTimeout } from '../core/errors.js';
import { silentLogger, type PipelineLogger } from '../core/logger.js';

export const ORACLE_ERROR_MARKER = 'ERROR contacting oracle:';

export type ChatMessage = { role: 'system'; content: string } | { role: 'user'; content: string };

export interface CompletionOptions {
  model: string;
  maxTokens: number;
  timeoutMs: number;
}

export interface CompletionTransport {
  complete(messages: ChatMessage[], options: CompletionOptions): Promise<string>;
}

export interface Oracle {
  ask(directive: string, snapshot: string): Promise<string>;
}

export class OpenAiTransport implements CompletionTransport {
  private readonly client: OpenAI;

  constructor(apiKey: string) {
    // One attempt per run.
    this.client = new OpenAI({ apiKey, maxRetries: 0 });
  }

  async complete(messages: ChatMessage[], options: CompletionOptions): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: options.model,
        messages,
        max_completion_tokens: options.maxTokens,
      },
      { timeout: options.timeoutMs }
    );
    return response.choices[0]?.message?.content ?? '';
  }
}

export function oracleFailure(detail: string): string {
  return `${ORACLE_ERROR_MARKER} ${detail}`;
}

export function isOracleFailure(reply: string): boolean {
  return reply.startsWith(ORACLE_ERROR_MARKER);
}

export class OracleClient implements Oracle {
  constructor(
    private readonly transport: CompletionTransport | null,
    private readonly options: CompletionOptions,
    private readonly logger: PipelineLogger = silentLogger
  ) {}

  /**
   * Returns the trimmed reply, or a string starting with
   * {@link ORACLE_ERROR_MARKER} when the completion could not be obtained.
   */
  async ask(directive: string, snapshot: string): Promise<string> {
    if (!this.transport) {
      return oracleFailure('no oracle API key configured');
    }

    const messages: ChatMessage[] = [
      { role: 'system', content: directive },
      { role: 'user', content: snapshot },
    ];
    try {
      const reply = await withTimeout(
        this.transport.complete(messages, this.options),
        this.options.timeoutMs,
        'oracle completion'
      );
      return reply.trim();
    } catch (error) {
      const detail = describeError(error);
      this.logger.warn(`Oracle call failed: ${detail}`);
      return oracleFailure(detail);
    }
  }
}

export function createOracleClient(
  config: Pick<BotConfig, 'oracleApiKey' | 'model' | 'maxTokens' | 'oracleTimeoutMs'>,
  logger: PipelineLogger = silentLogger
): OracleClient {
  const transport = config.oracleApiKey ? new OpenAiTransport(config.oracleApiKey) : null;
  return new OracleClient(
    transport,
    { model: config.model, maxTokens: config.maxTokens, timeoutMs: config.oracleTimeoutMs },
    logger
  );
}
