import type { ReportRecord } from '@weighbridge/shared-types';

import type { ReportStore } from '../store/report-store.js';

import { listReports, type ReportQuery } from './report.service.js';

export interface ExportOptions extends ReportQuery {
  /** Append the derived bag weight as a trailing column */
  includeBagWeight?: boolean;
}

export const EXPORT_COLUMNS = [
  'date',
  'shortKg',
  'excessKg',
  'perBagShortExcess',
  'emailSubject',
  'emailReceivedAt',
] as const;

/**
 * Escapes a field value for CSV format
 */
function escapeCSVField(value: string): string {
  if (!value) return '';

  if (value.includes(',') || value.includes('"') || value.includes('\n') || value.includes('\r')) {
    return `"${value.replace(/"/g, '""')}"`;
  }

  return value;
}

function toRow(record: ReportRecord, includeBagWeight: boolean): string[] {
  const row = [
    record.date,
    record.shortKg.toString(),
    record.excessKg.toString(),
    record.perBagShortExcess.toString(),
    record.sourceSubject,
    record.sourceReceivedAt,
  ];
  if (includeBagWeight) {
    row.push(record.bagWeightKg.toString());
  }
  return row;
}

/**
 * Render records as CSV, one line per record in the given order, with a
 * header line first. Lines end with "\n".
 */
export function reportsToCsv(records: readonly ReportRecord[], includeBagWeight = false): string {
  const headers: string[] = [...EXPORT_COLUMNS];
  if (includeBagWeight) headers.push('bagWeightKg');

  const csvRows: string[] = [headers.join(',')];
  for (const record of records) {
    csvRows.push(toRow(record, includeBagWeight).map(escapeCSVField).join(','));
  }
  return `${csvRows.join('\n')}\n`;
}

export async function exportReportsCsv(store: ReportStore, options: ExportOptions = {}): Promise<string> {
  const records = await listReports(store, options);
  console.log(`[EXPORT] Exporting ${records.length} reports`);
  return reportsToCsv(records, options.includeBagWeight ?? false);
}
