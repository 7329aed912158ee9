import { mkdtempSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';

import { describe, expect, it, vi } from 'vitest';

import { DEFAULT_SYSTEM_DIRECTIVE, loadSystemDirective } from '../../src/oracle/directive.js';

function tempDir(): string {
  return mkdtempSync(join(tmpdir(), 'signalbot-directive-'));
}

describe('loadSystemDirective', () => {
  it('returns the file contents', () => {
    const path = join(tempDir(), 'directive.txt');
    writeFileSync(path, 'Be terse.\n', 'utf-8');
    expect(loadSystemDirective(path)).toBe('Be terse.\n');
  });

  it('falls back to the built-in directive when the file is missing', () => {
    const warn = vi.fn();
    const logger = { debug: vi.fn(), info: vi.fn(), warn, error: vi.fn() };

    expect(loadSystemDirective(join(tempDir(), 'missing.txt'), logger)).toBe(DEFAULT_SYSTEM_DIRECTIVE);
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('falls back when the file is blank', () => {
    const path = join(tempDir(), 'blank.txt');
    writeFileSync(path, '  \n', 'utf-8');
    expect(loadSystemDirective(path)).toBe(DEFAULT_SYSTEM_DIRECTIVE);
  });
});
