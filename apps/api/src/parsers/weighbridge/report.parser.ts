/**
 * Regex-based parser for weigh-bridge delivery reports
 *
 * Example structure (two-section layout):
 * - Date: 05-Jan-2024
 * - Daily Report
 *     Total Delivery  Bag Weight  Physical Weight  Short  Excess
 *     31517           1575850     1577600          320    2070
 *     Per Bag Short: -0.0414
 * - Monthly to Date Report
 *     (same table, month-to-date totals; never read)
 */

import {
  ReportLayout,
  type CandidateReport,
  type ReportRecord,
  type SourceMessage,
} from '@weighbridge/shared-types';

import { normalizeReportText } from '../../utils/report-text-normalizer.js';
import { NOMINAL_BAG_WEIGHT_KG } from '../constants.js';
import { resolveReportDate } from '../utils/date-parser.js';
import { found, notFound, type Extraction } from '../utils/extraction-patterns.js';

import { detectReportLayout } from './detectReportLayout.js';
import { extractDeliveryFields, type DeliveryFields } from './field-extractor.js';
import { buildReportRecord } from './record-builder.js';
import { locateDailySection } from './section-locator.js';

export interface ParsedReportBody {
  date: string;
  layout: ReportLayout;
  fields: DeliveryFields;
}

export interface ParseReportOptions {
  nominalBagWeight?: number;
}

/**
 * Parse a report body. The subject is only consulted for the date when the
 * body carries none.
 */
export function parseReportBody(body: string, subject?: string): Extraction<ParsedReportBody> {
  const text = normalizeReportText(body);

  const date = resolveReportDate(text, subject);
  if (!date.found) return notFound(date.reason);

  const section = locateDailySection(text);
  if (!section.found) return notFound(section.reason);

  const fields = extractDeliveryFields(section.value.text);
  if (!fields.found) return notFound(fields.reason);

  return found({ date: date.value, layout: section.value.layout, fields: fields.value });
}

/**
 * Turn one inbound message into a reconciliation candidate. Failures are
 * carried on the candidate, never thrown.
 */
export function parseReport(message: SourceMessage, options: ParseReportOptions = {}): CandidateReport {
  const sourceSubject = message.subject;
  const sourceReceivedAt = message.receivedAt.toISOString();
  const parsed = parseReportBody(message.body, message.subject);

  if (!parsed.found) {
    return {
      record: null,
      failureReason: parsed.reason,
      layout: detectReportLayout(normalizeReportText(message.body)),
      sourceSubject,
      sourceReceivedAt,
    };
  }

  const record: ReportRecord = buildReportRecord(
    {
      date: parsed.value.date,
      shortKg: parsed.value.fields.shortKg,
      excessKg: parsed.value.fields.excessKg,
      perBagShortExcess: parsed.value.fields.perBagShortExcess,
      sourceSubject,
      sourceReceivedAt,
    },
    options.nominalBagWeight ?? NOMINAL_BAG_WEIGHT_KG
  );

  return {
    record,
    layout: parsed.value.layout,
    sourceSubject,
    sourceReceivedAt,
  };
}
