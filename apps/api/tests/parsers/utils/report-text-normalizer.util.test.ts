import { describe, it, expect } from 'vitest';
import { normalizeReportText } from '../../../src/utils/report-text-normalizer.js';

describe('normalizeReportText', () => {
  it('normalizes line endings', () => {
    expect(normalizeReportText('a\r\nb\rc')).toBe('a\nb\nc');
  });

  it('turns tabs and non-breaking spaces into spaces and trims', () => {
    expect(normalizeReportText('\u00A0x\t y  \n')).toBe('x  y');
  });

  it('drops zero-width characters', () => {
    expect(normalizeReportText('Sh\u200Bort Ex\uFEFFcess')).toBe('Short Excess');
  });

  it('returns an empty string for empty input', () => {
    expect(normalizeReportText('')).toBe('');
  });
});

