import { z } from 'zod';

const ISO_DATE_RE = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_RE = /^\d{4}-(0[1-9]|1[0-2])$/;

function isCalendarDate(value: string): boolean {
  const [y, m, d] = value.split('-').map(Number);
  if (!y || !m || !d) return false;
  const dt = new Date(Date.UTC(y, m - 1, d));
  return dt.getUTCFullYear() === y && dt.getUTCMonth() === m - 1 && dt.getUTCDate() === d;
}

export const IsoDateSchema = z
  .string()
  .regex(ISO_DATE_RE, 'Expected a date in YYYY-MM-DD format')
  .refine(isCalendarDate, 'Not a valid calendar date');

export const MonthSchema = z.string().regex(MONTH_RE, 'Expected a month in YYYY-MM format');

export const SyncRequestSchema = z
  .object({
    fromDate: IsoDateSchema,
    toDate: IsoDateSchema,
  })
  .refine((req) => req.fromDate <= req.toDate, {
    message: 'fromDate must not be after toDate',
    path: ['toDate'],
  });

export const ReportDateParamSchema = z.object({
  date: IsoDateSchema,
});

export const UpdateReportSchema = z.object({
  shortKg: z.number().int().min(0),
  excessKg: z.number().int().min(0),
  perBagShortExcess: z.number().finite(),
});

export const GetReportsQuerySchema = z
  .object({
    from: IsoDateSchema.optional(),
    to: IsoDateSchema.optional(),
    month: MonthSchema.optional(),
  })
  .refine((q) => !(q.month && (q.from || q.to)), {
    message: 'Use either month or from/to, not both',
    path: ['month'],
  })
  .refine((q) => !q.from || !q.to || q.from <= q.to, {
    message: 'from must not be after to',
    path: ['to'],
  });

export const ExportQuerySchema = z.object({
  includeBagWeight: z
    .enum(['true', 'false'])
    .optional()
    .transform((value) => value === 'true'),
});

export const SourceMessageSchema = z.object({
  senderAddress: z.string().default(''),
  senderDisplayName: z.string().default(''),
  subject: z.string().default(''),
  body: z.string().default(''),
  receivedAt: z.coerce.date(),
});

export const MessageFileSchema = z.object({
  messages: z.array(SourceMessageSchema),
});

export type SyncRequestInput = z.infer<typeof SyncRequestSchema>;
export type ReportDateParam = z.infer<typeof ReportDateParamSchema>;
export type UpdateReportInput = z.infer<typeof UpdateReportSchema>;
export type GetReportsQuery = z.infer<typeof GetReportsQuerySchema>;
export type ExportQuery = z.infer<typeof ExportQuerySchema>;
export type SourceMessageInput = z.infer<typeof SourceMessageSchema>;
export type MessageFile = z.infer<typeof MessageFileSchema>;
