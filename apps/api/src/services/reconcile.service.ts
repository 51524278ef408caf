import type { CandidateReport, ReportRecord } from '@weighbridge/shared-types';

export interface ReconcileResult {
  /** Winning record per date, in first-seen date order */
  records: Map<string, ReportRecord>;
  failedCount: number;
  /** Parsed records that lost to a later message for the same date */
  superseded: ReportRecord[];
}

function receivedAtMs(record: ReportRecord): number {
  const ms = Date.parse(record.sourceReceivedAt);
  return Number.isNaN(ms) ? Number.NEGATIVE_INFINITY : ms;
}

/**
 * Collapse candidates to at most one record per date. The strictly latest
 * `sourceReceivedAt` wins; on a tie the first one seen stays.
 */
export function reconcileCandidates(candidates: readonly CandidateReport[]): ReconcileResult {
  const records = new Map<string, ReportRecord>();
  const superseded: ReportRecord[] = [];
  let failedCount = 0;

  for (const candidate of candidates) {
    const record = candidate.record;
    if (!record) {
      failedCount++;
      continue;
    }

    const current = records.get(record.date);
    if (!current) {
      records.set(record.date, record);
    } else if (receivedAtMs(record) > receivedAtMs(current)) {
      superseded.push(current);
      records.set(record.date, record);
    } else {
      superseded.push(record);
    }
  }

  return { records, failedCount, superseded };
}
