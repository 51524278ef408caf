import { describe, it, expect } from 'vitest';
import { parseInteger, parseSignedDecimal } from '../../../src/parsers/utils/string-utils.js';

describe('string-utils', () => {
  describe('parseInteger', () => {
    it('parses plain and comma-grouped integers', () => {
      expect(parseInteger('320')).toBe(320);
      expect(parseInteger('1,575,850')).toBe(1575850);
      expect(parseInteger(' 2070 ')).toBe(2070);
    });

    it('rejects decimals, signs and empty input', () => {
      expect(parseInteger('3.5')).toBeUndefined();
      expect(parseInteger('-5')).toBeUndefined();
      expect(parseInteger('')).toBeUndefined();
    });
  });

  describe('parseSignedDecimal', () => {
    it('parses signed decimals', () => {
      expect(parseSignedDecimal('-0.0414')).toBe(-0.0414);
      expect(parseSignedDecimal('+.5')).toBe(0.5);
      expect(parseSignedDecimal('12.')).toBe(12);
    });

    it('rejects non-numeric text', () => {
      expect(parseSignedDecimal('abc')).toBeUndefined();
      expect(parseSignedDecimal('1.2.3')).toBeUndefined();
    });
  });
});
