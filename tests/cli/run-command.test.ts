import { describe, expect, it } from 'vitest';

import { toConfigOverrides } from '../../src/cli/run_command.js';

describe('toConfigOverrides', () => {
  it('leaves unset flags out', () => {
    expect(toConfigOverrides({})).toEqual({});
  });

  it('maps flags onto config options', () => {
    expect(
      toConfigOverrides({ symbols: 'NIFTY50,MF:PPFAS', live: true, journal: 'out.log', logLevel: 'debug' })
    ).toEqual({ symbols: 'NIFTY50,MF:PPFAS', dryRun: false, journalPath: 'out.log', logLevel: 'debug' });
    expect(toConfigOverrides({ dryRun: true })).toEqual({ dryRun: true });
  });

  it('rejects contradictory mode flags', () => {
    expect(() => toConfigOverrides({ live: true, dryRun: true })).toThrow('--live and --dry-run cannot be combined');
  });
});
