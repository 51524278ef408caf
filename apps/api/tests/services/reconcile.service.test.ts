import { ParseFailureReason, type CandidateReport, type ReportRecord } from '@weighbridge/shared-types';
import { describe, it, expect } from 'vitest';
import { reconcileCandidates } from '../../src/services/reconcile.service.js';

function record(date: string, receivedAt: string, shortKg: number): ReportRecord {
  return {
    date,
    shortKg,
    excessKg: 0,
    perBagShortExcess: 0,
    bagWeightKg: 50,
    sourceSubject: `Weigh Bridge Report ${receivedAt}`,
    sourceReceivedAt: receivedAt,
  };
}

function candidate(r: ReportRecord): CandidateReport {
  return { record: r, sourceSubject: r.sourceSubject, sourceReceivedAt: r.sourceReceivedAt };
}

describe('reconcileCandidates', () => {
  const morning = record('2024-01-05', '2024-01-05T09:00:00.000Z', 300);
  const afternoon = record('2024-01-05', '2024-01-05T14:00:00.000Z', 320);

  it('keeps the latest message for a date', () => {
    const result = reconcileCandidates([candidate(morning), candidate(afternoon)]);
    expect(result.records.get('2024-01-05')).toBe(afternoon);
    expect(result.superseded).toEqual([morning]);
  });

  it('does not depend on arrival order', () => {
    const result = reconcileCandidates([candidate(afternoon), candidate(morning)]);
    expect(result.records.get('2024-01-05')).toBe(afternoon);
    expect(result.superseded).toEqual([morning]);
  });

  it('keeps the first seen on equal timestamps', () => {
    const twin = record('2024-01-05', '2024-01-05T09:00:00.000Z', 999);
    const result = reconcileCandidates([candidate(morning), candidate(twin)]);
    expect(result.records.get('2024-01-05')).toBe(morning);
    expect(result.superseded).toEqual([twin]);
  });

  it('counts failed candidates and keeps one record per date', () => {
    const other = record('2024-01-06', '2024-01-06T09:00:00.000Z', 10);
    const failed: CandidateReport = {
      record: null,
      failureReason: ParseFailureReason.TABLE_NOT_FOUND,
      sourceSubject: 'Weigh Bridge Report',
      sourceReceivedAt: '2024-01-06T10:00:00.000Z',
    };

    const result = reconcileCandidates([candidate(morning), failed, candidate(other), candidate(afternoon)]);
    expect(result.failedCount).toBe(1);
    expect([...result.records.keys()]).toEqual(['2024-01-05', '2024-01-06']);
  });
});
