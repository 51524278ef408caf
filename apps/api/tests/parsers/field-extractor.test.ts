import { ParseFailureReason } from '@weighbridge/shared-types';
import { describe, it, expect } from 'vitest';
import {
  extractDeliveryFields,
  extractDeliveryTable,
  extractPerBagShortExcess,
} from '../../src/parsers/weighbridge/field-extractor.js';

describe('field-extractor', () => {
  it('reads the row after the anchored header', () => {
    const section = `Total Delivery  Bag Weight  Physical Weight  Short  Excess
31517  1575850  1577600  320  2070
Per Bag Short: -0.0414`;

    expect(extractDeliveryFields(section)).toEqual({
      found: true,
      value: {
        shortKg: 320,
        excessKg: 2070,
        perBagShortExcess: -0.0414,
        table: {
          totalDelivery: 31517,
          bagWeight: 1575850,
          physicalWeight: 1577600,
          shortKg: 320,
          excessKg: 2070,
        },
      },
    });
  });

  it('accepts thousands separators', () => {
    const table = extractDeliveryTable(
      'Physical Weight Short Excess\n31,517 1,575,850 1,577,600 320 2,070'
    );
    expect(table).toEqual({
      found: true,
      value: { totalDelivery: 31517, bagWeight: 1575850, physicalWeight: 1577600, shortKg: 320, excessKg: 2070 },
    });
  });

  it('falls back to the bare Short Excess header', () => {
    const table = extractDeliveryTable('Short  Excess\n10 20 30 4 5');
    expect(table).toEqual({
      found: true,
      value: { totalDelivery: 10, bagWeight: 20, physicalWeight: 30, shortKg: 4, excessKg: 5 },
    });
  });

  it('ignores numbers before the header', () => {
    const table = extractDeliveryTable('1 2 3 4 5\nShort Excess\n6 7 8 9 10');
    expect(table).toEqual({
      found: true,
      value: { totalDelivery: 6, bagWeight: 7, physicalWeight: 8, shortKg: 9, excessKg: 10 },
    });
  });

  it('reads the plural per-bag label with an explicit sign', () => {
    expect(extractPerBagShortExcess('Per Bags Short/Excess: +0.12')).toEqual({ found: true, value: 0.12 });
  });

  it('fails with TABLE_NOT_FOUND before looking at the per-bag value', () => {
    expect(extractDeliveryFields('Per Bag Short: 0.1')).toEqual({
      found: false,
      reason: ParseFailureReason.TABLE_NOT_FOUND,
    });
  });

  it('fails with PER_BAG_VALUE_NOT_FOUND when only the table is present', () => {
    expect(extractDeliveryFields('Short Excess\n1 2 3 4 5')).toEqual({
      found: false,
      reason: ParseFailureReason.PER_BAG_VALUE_NOT_FOUND,
    });
  });
});
