import { existsSync, readFileSync } from 'node:fs';

import yaml from 'yaml';
import { z } from 'zod';

import { parseInstrumentList } from '../market/classifier.js';
import { LOG_LEVELS } from './logger.js';

const TRUTHY = new Set(['true', '1', 'yes']);

const BooleanFlag = z
  .union([z.boolean(), z.string()])
  .transform((value) => (typeof value === 'boolean' ? value : TRUTHY.has(value.trim().toLowerCase())));

const SymbolList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) => Object.freeze(parseInstrumentList(value)));

const PositiveInt = z.coerce.number().int().positive();

const OptionalSecret = z
  .string()
  .optional()
  .transform((value) => (value && value.trim() ? value.trim() : undefined));

const ConfigSchema = z.object({
  model: z.string().min(1).default('gpt-5.1'),
  maxTokens: PositiveInt.default(600),
  symbols: SymbolList.default('NIFTY50'),
  dryRun: BooleanFlag.default(true),
  journalPath: z.string().min(1).default('signals.log'),
  quoteUrl: z.string().default(''),
  orderUrl: z.string().default(''),
  accessToken: OptionalSecret,
  directivePath: z.string().min(1).default('prompts/system-directive.txt'),
  oracleApiKey: OptionalSecret,
  requestTimeoutMs: PositiveInt.default(10_000),
  oracleTimeoutMs: PositiveInt.default(60_000),
  logLevel: z
    .string()
    .transform((value) => value.toLowerCase())
    .pipe(z.enum(LOG_LEVELS))
    .default('info'),
});

export type BotConfigInput = z.input<typeof ConfigSchema>;
export type BotConfig = Readonly<z.output<typeof ConfigSchema>>;

/** Environment variable consulted for each option. */
export const ENV_KEYS: Record<keyof BotConfigInput, string> = {
  model: 'ORACLE_MODEL',
  maxTokens: 'MAX_TOKENS',
  symbols: 'SYMBOLS',
  dryRun: 'DRY_RUN',
  journalPath: 'LOG_FILE',
  quoteUrl: 'QUOTE_URL',
  orderUrl: 'ORDER_URL',
  accessToken: 'BROKER_ACCESS_TOKEN',
  directivePath: 'SYSTEM_PROMPT_PATH',
  oracleApiKey: 'OPENAI_API_KEY',
  requestTimeoutMs: 'REQUEST_TIMEOUT_MS',
  oracleTimeoutMs: 'ORACLE_TIMEOUT_MS',
  logLevel: 'SIGNALBOT_LOG_LEVEL',
};

export const CONFIG_PATH_ENV = 'SIGNALBOT_CONFIG_PATH';

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<BotConfigInput>;
}

const FileValues = z.record(z.unknown()).nullable();

function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    throw new Error(`Config file not found: ${path}`);
  }
  const parsed = FileValues.parse(yaml.parse(readFileSync(path, 'utf-8')));
  return parsed ?? {};
}

function definedEntries(values: Record<string, unknown> | undefined): Record<string, unknown> {
  return Object.fromEntries(Object.entries(values ?? {}).filter(([, value]) => value !== undefined));
}

function readEnv(env: NodeJS.ProcessEnv): Record<string, string> {
  const values: Record<string, string> = {};
  for (const [option, name] of Object.entries(ENV_KEYS)) {
    const value = env[name];
    if (value !== undefined) values[option] = value;
  }
  return values;
}

/**
 * Builds the run configuration once: YAML file (optional), then environment,
 * then explicit overrides. The result is frozen and passed to every stage.
 */
export function loadConfig(options: LoadConfigOptions = {}): BotConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? env[CONFIG_PATH_ENV];
  const fileValues = configPath ? readConfigFile(configPath) : {};

  const config = ConfigSchema.parse({
    ...fileValues,
    ...readEnv(env),
    ...definedEntries(options.overrides),
  });
  return Object.freeze(config);
}
