import type { ReportRangeSummary, ReportRecord, UpdateReportRequest } from '@weighbridge/shared-types';

import { RecordNotFoundError } from '../errors.js';
import { NOMINAL_BAG_WEIGHT_KG } from '../parsers/constants.js';
import { getMonthRange } from '../parsers/utils/date-parser.js';
import { buildReportRecord } from '../parsers/weighbridge/record-builder.js';
import type { ReportStore } from '../store/report-store.js';
import { logger } from '../utils/sentry.js';

export interface ReportQuery {
  from?: string;
  to?: string;
  /** YYYY-MM; takes the whole calendar month */
  month?: string;
}

const EARLIEST_DATE = '0000-01-01';
const LATEST_DATE = '9999-12-31';

/**
 * List stored reports ordered by date, optionally limited to a month or an
 * inclusive from/to range (either bound may be left open)
 */
export async function listReports(store: ReportStore, query: ReportQuery = {}): Promise<ReportRecord[]> {
  if (query.month) {
    const { fromDate, toDate } = getMonthRange(query.month);
    return store.getByRange(fromDate, toDate);
  }
  if (query.from || query.to) {
    return store.getByRange(query.from ?? EARLIEST_DATE, query.to ?? LATEST_DATE);
  }
  return store.getAll();
}

export async function getReport(store: ReportStore, date: string): Promise<ReportRecord> {
  const record = await store.getByKey(date);
  if (!record) {
    throw new RecordNotFoundError(date);
  }
  return record;
}

/**
 * Manual correction: replace the measured values of an existing day and
 * recompute the bag weight. Provenance of the original message is kept.
 */
export async function updateReport(
  store: ReportStore,
  date: string,
  input: UpdateReportRequest,
  nominalBagWeight: number = NOMINAL_BAG_WEIGHT_KG
): Promise<ReportRecord> {
  const existing = await getReport(store, date);

  const record = buildReportRecord(
    {
      date,
      shortKg: input.shortKg,
      excessKg: input.excessKg,
      perBagShortExcess: input.perBagShortExcess,
      sourceSubject: existing.sourceSubject,
      sourceReceivedAt: existing.sourceReceivedAt,
    },
    nominalBagWeight
  );

  await store.upsertByKey(date, record);

  logger.info('Report manually corrected', {
    date,
    shortKg: record.shortKg,
    excessKg: record.excessKg,
    perBagShortExcess: record.perBagShortExcess,
    previousPerBagShortExcess: existing.perBagShortExcess,
  });

  return record;
}

export async function deleteReport(store: ReportStore, date: string): Promise<void> {
  const deleted = await store.deleteByKey(date);
  if (!deleted) {
    throw new RecordNotFoundError(date);
  }
  logger.info('Report deleted', { date });
}

function average(values: number[]): number | null {
  if (values.length === 0) return null;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Totals and averages over a set of records, as shown on a dashboard summary
 */
export function summarizeReports(records: readonly ReportRecord[]): ReportRangeSummary {
  const dates = records.map((r) => r.date).sort();

  return {
    fromDate: dates[0] ?? null,
    toDate: dates[dates.length - 1] ?? null,
    days: records.length,
    totalShortKg: records.reduce((sum, r) => sum + r.shortKg, 0),
    totalExcessKg: records.reduce((sum, r) => sum + r.excessKg, 0),
    averageBagWeightKg: average(records.map((r) => r.bagWeightKg)),
    averagePerBagShortExcess: average(records.map((r) => r.perBagShortExcess)),
  };
}

export async function summarizeRange(store: ReportStore, query: ReportQuery = {}): Promise<ReportRangeSummary> {
  return summarizeReports(await listReports(store, query));
}
