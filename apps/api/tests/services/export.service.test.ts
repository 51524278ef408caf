import type { ReportRecord } from '@weighbridge/shared-types';
import Database from 'better-sqlite3';
import { describe, it, expect } from 'vitest';
import { EXPORT_COLUMNS, exportReportsCsv, reportsToCsv } from '../../src/services/export.service.js';
import { SqliteReportStore } from '../../src/store/sqlite-report-store.js';

const RECORD: ReportRecord = {
  date: '2024-01-05',
  shortKg: 320,
  excessKg: 2070,
  perBagShortExcess: -0.0414,
  bagWeightKg: 50.0414,
  sourceSubject: 'Weigh Bridge Report, 05-Jan',
  sourceReceivedAt: '2024-01-05T09:00:00.000Z',
};

const HEADER = 'date,shortKg,excessKg,perBagShortExcess,emailSubject,emailReceivedAt';

describe('export.service', () => {
  describe('reportsToCsv', () => {
    it('writes a header line for the export columns', () => {
      expect(reportsToCsv([])).toBe(`${HEADER}\n`);
      expect(HEADER.split(',')).toEqual([...EXPORT_COLUMNS]);
    });

    it('quotes fields containing commas', () => {
      expect(reportsToCsv([RECORD])).toBe(
        `${HEADER}\n2024-01-05,320,2070,-0.0414,"Weigh Bridge Report, 05-Jan",2024-01-05T09:00:00.000Z\n`
      );
    });

    it('doubles embedded quotes', () => {
      const csv = reportsToCsv([{ ...RECORD, sourceSubject: 'Fwd: "Weigh Bridge Report"' }]);
      expect(csv.split('\n')[1]).toBe(
        '2024-01-05,320,2070,-0.0414,"Fwd: ""Weigh Bridge Report""",2024-01-05T09:00:00.000Z'
      );
    });

    it('appends the bag weight column on request', () => {
      const csv = reportsToCsv([{ ...RECORD, perBagShortExcess: 0.5, bagWeightKg: 49.5, sourceSubject: 'Report' }], true);

      expect(csv).toBe(
        `${HEADER},bagWeightKg\n2024-01-05,320,2070,0.5,Report,2024-01-05T09:00:00.000Z,49.5\n`
      );
    });

    it('keeps the order it is given', () => {
      const later = { ...RECORD, date: '2024-01-06', sourceSubject: 'Report' };
      const lines = reportsToCsv([later, RECORD]).split('\n');

      expect(lines[1]?.startsWith('2024-01-06,')).toBe(true);
      expect(lines[2]?.startsWith('2024-01-05,')).toBe(true);
    });
  });

  describe('exportReportsCsv', () => {
    it('exports the stored records in date order', async () => {
      const store = new SqliteReportStore(new Database(':memory:'));
      await store.ensureTable();
      await store.upsertByKey('2024-01-06', { ...RECORD, date: '2024-01-06', sourceSubject: 'Report' });
      await store.upsertByKey('2024-01-05', { ...RECORD, sourceSubject: 'Report' });

      const csv = await exportReportsCsv(store);

      expect(csv).toBe(
        `${HEADER}\n` +
          '2024-01-05,320,2070,-0.0414,Report,2024-01-05T09:00:00.000Z\n' +
          '2024-01-06,320,2070,-0.0414,Report,2024-01-05T09:00:00.000Z\n'
      );
    });
  });
});
