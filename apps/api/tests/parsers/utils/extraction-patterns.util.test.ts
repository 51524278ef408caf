import { ParseFailureReason } from '@weighbridge/shared-types';
import { describe, it, expect } from 'vitest';
import {
  createHeaderRelativeStrategy,
  createRegexStrategy,
  toExtraction,
  tryExtractionStrategies,
} from '../../../src/parsers/utils/extraction-patterns.js';

describe('extraction-patterns', () => {
  it('tryExtractionStrategies returns first successful result', () => {
    const res = tryExtractionStrategies('abc 123', [
      () => undefined,
      (t) => (t.includes('123') ? 'ok' : undefined),
      () => 'later',
    ]);
    expect(res).toBe('ok');
  });

  it('tryExtractionStrategies returns undefined when nothing matches', () => {
    expect(tryExtractionStrategies('abc', [() => undefined])).toBeUndefined();
  });

  it('createRegexStrategy extracts with transform', () => {
    const strategy = createRegexStrategy(/Per\s+Bag\s+Short:\s*(-?\d+\.\d+)/i, (m) => m[1]);
    expect(strategy('Per Bag Short: -0.0414')).toBe('-0.0414');
    expect(strategy('no match')).toBeUndefined();
  });

  it('createHeaderRelativeStrategy only searches after the header', () => {
    const strategy = createHeaderRelativeStrategy(/Short\s+Excess/i, /(\d+)\s+(\d+)/, (m) => [m[1], m[2]]);
    expect(strategy('1 2\nShort Excess\n10 20')).toEqual(['10', '20']);
    expect(strategy('10 20 with no header')).toBeUndefined();
  });

  it('createHeaderRelativeStrategy respects maxSpan', () => {
    const strategy = createHeaderRelativeStrategy(/Short\s+Excess/i, /(\d+)/, (m) => m[1], 3);
    expect(strategy('Short Excess 7')).toBe('7');
    expect(strategy('Short Excess      7')).toBeUndefined();
  });

  it('toExtraction tags the result', () => {
    expect(toExtraction(5, ParseFailureReason.TABLE_NOT_FOUND)).toEqual({ found: true, value: 5 });
    expect(toExtraction(undefined, ParseFailureReason.TABLE_NOT_FOUND)).toEqual({
      found: false,
      reason: ParseFailureReason.TABLE_NOT_FOUND,
    });
  });
});
