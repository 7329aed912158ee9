import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it } from 'vitest';

import { loadConfig } from '../../src/core/config.js';

function writeTempConfig(body: string): string {
  const dir = mkdtempSync(join(tmpdir(), 'signalbot-config-'));
  const path = join(dir, 'config.yaml');
  writeFileSync(path, body, 'utf-8');
  return path;
}

describe('loadConfig', () => {
  it('applies defaults with an empty environment', () => {
    const config = loadConfig({ env: {} });

    expect(config).toEqual({
      model: 'gpt-5.1',
      maxTokens: 600,
      symbols: ['NIFTY50'],
      dryRun: true,
      journalPath: 'signals.log',
      quoteUrl: '',
      orderUrl: '',
      accessToken: undefined,
      directivePath: 'prompts/system-directive.txt',
      oracleApiKey: undefined,
      requestTimeoutMs: 10_000,
      oracleTimeoutMs: 60_000,
      logLevel: 'info',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('reads recognized environment variables', () => {
    const config = loadConfig({
      env: {
        SYMBOLS: 'NIFTY50, NSE:RELIANCE,,',
        MAX_TOKENS: '900',
        DRY_RUN: 'false',
        LOG_FILE: '/var/log/signals.log',
        QUOTE_URL: 'https://quotes.test',
        ORDER_URL: 'https://broker.test/orders',
        BROKER_ACCESS_TOKEN: 'test-token',
        SIGNALBOT_LOG_LEVEL: 'DEBUG',
      },
    });

    expect(config.symbols).toEqual(['NIFTY50', 'NSE:RELIANCE']);
    expect(config.maxTokens).toBe(900);
    expect(config.dryRun).toBe(false);
    expect(config.journalPath).toBe('/var/log/signals.log');
    expect(config.quoteUrl).toBe('https://quotes.test');
    expect(config.orderUrl).toBe('https://broker.test/orders');
    expect(config.accessToken).toBe('test-token');
    expect(config.logLevel).toBe('debug');
  });

  it.each([
    ['true', true],
    ['1', true],
    ['YES', true],
    ['no', false],
    ['0', false],
  ])('parses DRY_RUN=%s as %s', (value, expected) => {
    expect(loadConfig({ env: { DRY_RUN: value } }).dryRun).toBe(expected);
  });

  it('treats a blank credential as absent', () => {
    expect(loadConfig({ env: { BROKER_ACCESS_TOKEN: '  ' } }).accessToken).toBeUndefined();
  });

  it('layers file, environment and overrides in that order', () => {
    const path = writeTempConfig(`
model: file-model
symbols:
  - ETF:NIFTYBEES
  - MF:PPFAS
dryRun: false
maxTokens: 300
`);

    const config = loadConfig({
      configPath: path,
      env: { MAX_TOKENS: '450' },
      overrides: { dryRun: true, journalPath: undefined },
    });

    expect(config.model).toBe('file-model');
    expect(config.symbols).toEqual(['ETF:NIFTYBEES', 'MF:PPFAS']);
    expect(config.maxTokens).toBe(450);
    expect(config.dryRun).toBe(true);
    expect(config.journalPath).toBe('signals.log');
  });

  it('reads the config path from the environment', () => {
    const path = writeTempConfig('model: env-path-model\n');
    expect(loadConfig({ env: { SIGNALBOT_CONFIG_PATH: path } }).model).toBe('env-path-model');
  });

  it('rejects invalid values', () => {
    expect(() => loadConfig({ env: { MAX_TOKENS: 'lots' } })).toThrow();
    expect(() => loadConfig({ env: { SIGNALBOT_LOG_LEVEL: 'verbose' } })).toThrow();
  });

  it('rejects a missing config file', () => {
    expect(() => loadConfig({ configPath: join(tmpdir(), 'signalbot-does-not-exist.yaml'), env: {} })).toThrow(
      'Config file not found'
    );
  });
});
