/**
 * Extracts the delivery table and per-bag value from the daily section
 *
 * Example table (columns are positional):
 *
 *   Total Delivery  Bag Weight  Physical Weight  Short  Excess
 *   31517           1575850     1577600          320    2070
 *
 *   Per Bag Short: -0.0414
 *
 * Only Short and Excess are kept from the row.
 */

import { ParseFailureReason } from '@weighbridge/shared-types';

import {
  ANCHORED_TABLE_HEADER_RE,
  COLUMN_BAG_WEIGHT,
  COLUMN_EXCESS,
  COLUMN_PHYSICAL_WEIGHT,
  COLUMN_SHORT,
  COLUMN_TOTAL_DELIVERY,
  FIVE_INTEGER_ROW_RE,
  PER_BAG_VALUE_RE,
  SHORT_EXCESS_HEADER_RE,
} from '../constants.js';
import {
  createHeaderRelativeStrategy,
  createRegexStrategy,
  found,
  notFound,
  toExtraction,
  tryExtractionStrategies,
  type Extraction,
  type ExtractionStrategy,
} from '../utils/extraction-patterns.js';
import { parseInteger, parseSignedDecimal } from '../utils/string-utils.js';

export interface DeliveryTableRow {
  totalDelivery: number;
  bagWeight: number;
  physicalWeight: number;
  shortKg: number;
  excessKg: number;
}

export interface DeliveryFields {
  shortKg: number;
  excessKg: number;
  perBagShortExcess: number;
  table: DeliveryTableRow;
}

function rowFromMatch(match: RegExpMatchArray): DeliveryTableRow | undefined {
  const values: number[] = [];
  for (const raw of match.slice(1, 6)) {
    const value = raw === undefined ? undefined : parseInteger(raw);
    if (value === undefined) return undefined;
    values.push(value);
  }

  const [totalDelivery, bagWeight, physicalWeight, shortKg, excessKg] = [
    values[COLUMN_TOTAL_DELIVERY],
    values[COLUMN_BAG_WEIGHT],
    values[COLUMN_PHYSICAL_WEIGHT],
    values[COLUMN_SHORT],
    values[COLUMN_EXCESS],
  ];
  if (
    totalDelivery === undefined ||
    bagWeight === undefined ||
    physicalWeight === undefined ||
    shortKg === undefined ||
    excessKg === undefined
  ) {
    return undefined;
  }

  return { totalDelivery, bagWeight, physicalWeight, shortKg, excessKg };
}

/**
 * "Physical Weight Short Excess" (also the tail of the full five-column
 * header), then the first run of five integers.
 */
export const anchoredTableStrategy: ExtractionStrategy<DeliveryTableRow> =
  createHeaderRelativeStrategy(ANCHORED_TABLE_HEADER_RE, FIVE_INTEGER_ROW_RE, rowFromMatch);

/**
 * Bare "Short Excess" header pair, then the first run of five integers.
 */
export const headerRelativeTableStrategy: ExtractionStrategy<DeliveryTableRow> =
  createHeaderRelativeStrategy(SHORT_EXCESS_HEADER_RE, FIVE_INTEGER_ROW_RE, rowFromMatch);

export const TABLE_STRATEGIES: ExtractionStrategy<DeliveryTableRow>[] = [
  anchoredTableStrategy,
  headerRelativeTableStrategy,
];

export const perBagStrategy: ExtractionStrategy<number> = createRegexStrategy(
  PER_BAG_VALUE_RE,
  (match) => (match[1] === undefined ? undefined : parseSignedDecimal(match[1]))
);

export function extractDeliveryTable(section: string): Extraction<DeliveryTableRow> {
  return toExtraction(
    tryExtractionStrategies(section, TABLE_STRATEGIES),
    ParseFailureReason.TABLE_NOT_FOUND
  );
}

export function extractPerBagShortExcess(section: string): Extraction<number> {
  return toExtraction(perBagStrategy(section), ParseFailureReason.PER_BAG_VALUE_NOT_FOUND);
}

/**
 * Extract short/excess and the per-bag value. Either part missing fails the
 * whole extraction; partial results are never returned.
 */
export function extractDeliveryFields(section: string): Extraction<DeliveryFields> {
  const table = extractDeliveryTable(section);
  if (!table.found) return notFound(table.reason);

  const perBag = extractPerBagShortExcess(section);
  if (!perBag.found) return notFound(perBag.reason);

  return found({
    shortKg: table.value.shortKg,
    excessKg: table.value.excessKg,
    perBagShortExcess: perBag.value,
    table: table.value,
  });
}
