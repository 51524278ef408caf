import { describe, it, expect } from 'vitest';
import { ZodError } from 'zod';
import { USAGE, parseSyncArgs } from '../../scripts/sync-args.js';

describe('parseSyncArgs', () => {
  it('reads an explicit range', () => {
    expect(parseSyncArgs(['--from', '2024-01-05', '--to', '2024-01-09'])).toEqual({
      fromDate: '2024-01-05',
      toDate: '2024-01-09',
    });
  });

  it('syncs a single day when --to is left out', () => {
    expect(parseSyncArgs(['--from', '2024-01-05'])).toEqual({ fromDate: '2024-01-05', toDate: '2024-01-05' });
  });

  it('expands --month to the whole month', () => {
    expect(parseSyncArgs(['--month', '2024-02'])).toEqual({ fromDate: '2024-02-01', toDate: '2024-02-29' });
  });

  it('prints usage without arguments', () => {
    expect(() => parseSyncArgs([])).toThrow(USAGE);
  });

  it('rejects unknown flags and missing values', () => {
    expect(() => parseSyncArgs(['--since', '2024-01-01'])).toThrow("Unexpected argument '--since'");
    expect(() => parseSyncArgs(['--from', '--to', '2024-01-01'])).toThrow("Unexpected argument '--from'");
  });

  it('rejects --month together with a range', () => {
    expect(() => parseSyncArgs(['--month', '2024-01', '--from', '2024-01-05'])).toThrow(
      'Use either --month or --from/--to'
    );
  });

  it('validates the dates', () => {
    expect(() => parseSyncArgs(['--from', '2024-01-09', '--to', '2024-01-05'])).toThrow(ZodError);
    expect(() => parseSyncArgs(['--month', '2024-13'])).toThrow(ZodError);
  });
});
