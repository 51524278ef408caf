import {
  ExportQuerySchema,
  GetReportsQuerySchema,
  ReportDateParamSchema,
  UpdateReportSchema,
} from '@weighbridge/shared-validation';
import type { DeleteReportResponse, GetReportsResponse } from '@weighbridge/shared-types';
import { FastifyPluginAsync } from 'fastify';

import * as exportService from '../services/export.service.js';
import * as reportService from '../services/report.service.js';

export interface ReportRoutesOptions {
  nominalBagWeight: number;
}

export const reportRoutes: FastifyPluginAsync<ReportRoutesOptions> = async (fastify, opts) => {
  fastify.get('/', {
    schema: {
      description: 'List stored daily reports ordered by date',
      tags: ['reports'],
    },
    handler: async (request): Promise<GetReportsResponse> => {
      const query = GetReportsQuerySchema.parse(request.query);
      const reports = await reportService.listReports(fastify.reportStore, query);
      return { reports, total: reports.length };
    },
  });

  fastify.get('/summary', {
    schema: {
      description: 'Totals and average bag weight over a date range',
      tags: ['reports'],
    },
    handler: async (request) => {
      const query = GetReportsQuerySchema.parse(request.query);
      return await reportService.summarizeRange(fastify.reportStore, query);
    },
  });

  fastify.get('/export.csv', {
    schema: {
      description: 'Download all reports as CSV',
      tags: ['reports'],
    },
    handler: async (request, reply) => {
      const { includeBagWeight } = ExportQuerySchema.parse(request.query);
      const csv = await exportService.exportReportsCsv(fastify.reportStore, { includeBagWeight });
      reply
        .type('text/csv; charset=utf-8')
        .header('Content-Disposition', 'attachment; filename="weighbridge-reports.csv"')
        .send(csv);
    },
  });

  fastify.get('/:date', {
    schema: {
      description: 'Get the report for one day',
      tags: ['reports'],
    },
    handler: async (request) => {
      const { date } = ReportDateParamSchema.parse(request.params);
      return await reportService.getReport(fastify.reportStore, date);
    },
  });

  fastify.put('/:date', {
    schema: {
      description: 'Manually correct the values of one day',
      tags: ['reports'],
    },
    handler: async (request) => {
      const { date } = ReportDateParamSchema.parse(request.params);
      const data = UpdateReportSchema.parse(request.body);
      return await reportService.updateReport(fastify.reportStore, date, data, opts.nominalBagWeight);
    },
  });

  fastify.delete('/:date', {
    schema: {
      description: 'Delete the report for one day',
      tags: ['reports'],
    },
    handler: async (request): Promise<DeleteReportResponse> => {
      const { date } = ReportDateParamSchema.parse(request.params);
      await reportService.deleteReport(fastify.reportStore, date);
      return { success: true, date };
    },
  });
};
