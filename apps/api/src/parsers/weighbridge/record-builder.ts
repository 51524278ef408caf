import type { ReportRecord } from '@weighbridge/shared-types';

import { NOMINAL_BAG_WEIGHT_KG } from '../constants.js';

export interface ReportRecordInput {
  date: string;
  shortKg: number;
  excessKg: number;
  perBagShortExcess: number;
  sourceSubject: string;
  sourceReceivedAt: string;
}

/**
 * Bag weight = nominal bag weight - per-bag short/excess
 *
 * @example
 * computeBagWeight(-0.0414) // 50.0414
 */
export function computeBagWeight(
  perBagShortExcess: number,
  nominalBagWeight: number = NOMINAL_BAG_WEIGHT_KG
): number {
  return nominalBagWeight - perBagShortExcess;
}

export function buildReportRecord(
  input: ReportRecordInput,
  nominalBagWeight: number = NOMINAL_BAG_WEIGHT_KG
): ReportRecord {
  return {
    date: input.date,
    shortKg: input.shortKg,
    excessKg: input.excessKg,
    perBagShortExcess: input.perBagShortExcess,
    bagWeightKg: computeBagWeight(input.perBagShortExcess, nominalBagWeight),
    sourceSubject: input.sourceSubject,
    sourceReceivedAt: input.sourceReceivedAt,
  };
}
