import type { ReportRecord } from '@weighbridge/shared-types';
import type { FastifyInstance } from 'fastify';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SqliteReportStore } from '../../src/store/sqlite-report-store.js';
import { buildTestApp } from '../fixtures/app.js';

const JAN_05: ReportRecord = {
  date: '2024-01-05',
  shortKg: 320,
  excessKg: 2070,
  perBagShortExcess: 0.5,
  bagWeightKg: 49.5,
  sourceSubject: 'Weigh Bridge Report, 05-Jan',
  sourceReceivedAt: '2024-01-05T09:00:00.000Z',
};

const FEB_01: ReportRecord = {
  date: '2024-02-01',
  shortKg: 100,
  excessKg: 660,
  perBagShortExcess: 0.25,
  bagWeightKg: 49.75,
  sourceSubject: 'Weigh Bridge Report',
  sourceReceivedAt: '2024-02-01T09:00:00.000Z',
};

describe('/reports', () => {
  let app: FastifyInstance;
  let store: SqliteReportStore;

  beforeEach(async () => {
    ({ app, store } = await buildTestApp());
    await store.upsertByKey(FEB_01.date, FEB_01);
    await store.upsertByKey(JAN_05.date, JAN_05);
  });

  afterEach(async () => {
    await app.close();
  });

  describe('GET /reports', () => {
    it('lists every report in date order', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ reports: [JAN_05, FEB_01], total: 2 });
    });

    it('filters by month', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports?month=2024-02' });

      expect(response.json()).toEqual({ reports: [FEB_01], total: 1 });
    });

    it('rejects month combined with a date range', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports?month=2024-02&from=2024-02-01' });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('GET /reports/summary', () => {
    it('summarizes the selected range', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports/summary?from=2024-01-01&to=2024-01-31' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        fromDate: '2024-01-05',
        toDate: '2024-01-05',
        days: 1,
        totalShortKg: 320,
        totalExcessKg: 2070,
        averageBagWeightKg: 49.5,
        averagePerBagShortExcess: 0.5,
      });
    });
  });

  describe('GET /reports/export.csv', () => {
    it('downloads the stored reports as CSV', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports/export.csv?includeBagWeight=true' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/csv; charset=utf-8');
      expect(response.headers['content-disposition']).toBe('attachment; filename="weighbridge-reports.csv"');
      expect(response.body).toBe(
        'date,shortKg,excessKg,perBagShortExcess,emailSubject,emailReceivedAt,bagWeightKg\n' +
          '2024-01-05,320,2070,0.5,"Weigh Bridge Report, 05-Jan",2024-01-05T09:00:00.000Z,49.5\n' +
          '2024-02-01,100,660,0.25,Weigh Bridge Report,2024-02-01T09:00:00.000Z,49.75\n'
      );
    });
  });

  describe('GET /reports/:date', () => {
    it('returns one report', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports/2024-01-05' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual(JAN_05);
    });

    it('answers 404 for a day without a report', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports/2024-01-06' });

      expect(response.statusCode).toBe(404);
      expect(response.json()).toEqual({
        error: 'RecordNotFoundError',
        message: 'No report stored for 2024-01-06',
        statusCode: 404,
      });
    });

    it('answers 400 for an impossible date', async () => {
      const response = await app.inject({ method: 'GET', url: '/reports/2024-02-30' });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ error: 'Validation Error', message: 'Request validation failed' });
    });
  });

  describe('PUT /reports/:date', () => {
    it('corrects the values and recomputes the bag weight', async () => {
      const response = await app.inject({
        method: 'PUT',
        url: '/reports/2024-01-05',
        payload: { shortKg: 300, excessKg: 2000, perBagShortExcess: -0.5 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({
        ...JAN_05,
        shortKg: 300,
        excessKg: 2000,
        perBagShortExcess: -0.5,
        bagWeightKg: 50.5,
      });
      expect((await store.getByKey('2024-01-05'))?.bagWeightKg).toBe(50.5);
    });

    it('rejects negative kilograms', async () => {
      const response = await app.inject({
        method: 'PUT',
        url: '/reports/2024-01-05',
        payload: { shortKg: -1, excessKg: 2000, perBagShortExcess: 0 },
      });

      expect(response.statusCode).toBe(400);
    });
  });

  describe('DELETE /reports/:date', () => {
    it('deletes the report', async () => {
      const response = await app.inject({ method: 'DELETE', url: '/reports/2024-02-01' });

      expect(response.statusCode).toBe(200);
      expect(response.json()).toEqual({ success: true, date: '2024-02-01' });
      await expect(store.getByKey('2024-02-01')).resolves.toBeNull();
    });

    it('answers 404 when there is nothing to delete', async () => {
      const response = await app.inject({ method: 'DELETE', url: '/reports/2024-03-01' });

      expect(response.statusCode).toBe(404);
    });
  });
});
