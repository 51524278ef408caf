/**
 * Locates the daily part of a weigh-bridge report
 *
 * Report bodies come in three layouts:
 * - SINGLE_SECTION: one table, nothing else to confuse it with
 * - TWO_SECTION: "Daily Report" ... "Monthly to Date Report" ...
 * - TWO_COLUMN: "Delivery Information: Bag Cement" followed by the table
 *   header twice, daily first and month-to-date second, either stacked or
 *   side by side on one line
 *
 * Each layout is an independent strategy; they are tried in order and the
 * first that applies decides the section. Nothing from the month-to-date part
 * may ever be inside the returned span.
 */

import { ParseFailureReason, ReportLayout } from '@weighbridge/shared-types';

import {
  DAILY_REPORT_MARKER_RE,
  DELIVERY_INFORMATION_MARKER_RE,
  FIVE_INTEGER_ROW_RE,
  FULL_TABLE_HEADER_GLOBAL_RE,
  FULL_TABLE_HEADER_RE,
  MONTHLY_REPORT_MARKER_RE,
  PER_BAG_VALUE_RE,
  SHORT_EXCESS_HEADER_RE,
} from '../constants.js';
import {
  toExtraction,
  tryExtractionStrategies,
  type ExtractionStrategy,
  type Extraction,
} from '../utils/extraction-patterns.js';

export interface DailySection {
  layout: ReportLayout;
  /** Offset of the section in the full text */
  start: number;
  /** Exclusive end offset in the full text */
  end: number;
  /**
   * `fullText.slice(start, end)`, except for side-by-side tables where the
   * daily per-bag label found after `end` is appended on its own line
   */
  text: string;
}

/** True when the text holds a table header the field extractor can anchor on */
export function hasTableAnchor(text: string): boolean {
  return FULL_TABLE_HEADER_RE.test(text) || SHORT_EXCESS_HEADER_RE.test(text);
}

function span(fullText: string, layout: ReportLayout, start: number, end: number): DailySection {
  return { layout, start, end, text: fullText.slice(start, end) };
}

/**
 * "Daily Report" marker, optionally followed by "Monthly to Date".
 * The section is the text strictly between the two markers. When the markers
 * are only column captions with no table between them, this layout does not
 * apply.
 */
export const dailyMarkerStrategy: ExtractionStrategy<DailySection> = (text) => {
  const daily = text.match(DAILY_REPORT_MARKER_RE);
  if (!daily || daily.index === undefined) return undefined;

  const start = daily.index + daily[0].length;
  const monthly = text.slice(start).match(MONTHLY_REPORT_MARKER_RE);
  const end = monthly?.index !== undefined ? start + monthly.index : text.length;

  const section = span(text, ReportLayout.TWO_SECTION, start, end);
  return hasTableAnchor(section.text) ? section : undefined;
};

/**
 * Daily columns of a side-by-side table: the header line through the first
 * five-integer run, plus the first per-bag label after it. Whatever follows
 * each of those on its line belongs to the month-to-date columns.
 */
function sideBySideSection(text: string, start: number, headerEnd: number, fallbackEnd: number): DailySection {
  const row = text.slice(headerEnd).match(FIVE_INTEGER_ROW_RE);
  if (row?.index === undefined) {
    return span(text, ReportLayout.TWO_COLUMN, start, fallbackEnd);
  }

  const end = headerEnd + row.index + row[0].length;
  const section = span(text, ReportLayout.TWO_COLUMN, start, end);
  const perBag = text.slice(end).match(PER_BAG_VALUE_RE);
  return perBag ? { ...section, text: `${section.text}\n${perBag[0]}` } : section;
}

/**
 * Table header repeated twice, daily first. Stacked tables: the section runs
 * from the first header to the second. Side-by-side tables (both headers on
 * one line): see `sideBySideSection`.
 */
export const repeatedHeaderStrategy: ExtractionStrategy<DailySection> = (text) => {
  const label = text.match(DELIVERY_INFORMATION_MARKER_RE);
  const searchFrom = label?.index !== undefined ? label.index + label[0].length : 0;

  const headers = [...text.slice(searchFrom).matchAll(FULL_TABLE_HEADER_GLOBAL_RE)];
  if (headers.length < 2) return undefined;

  const [first, second] = headers;
  if (first?.index === undefined || second?.index === undefined) return undefined;

  const start = searchFrom + first.index;
  const firstEnd = start + first[0].length;
  const secondStart = searchFrom + second.index;

  if (!text.slice(firstEnd, secondStart).includes('\n')) {
    return sideBySideSection(text, start, secondStart + second[0].length, secondStart);
  }
  return span(text, ReportLayout.TWO_COLUMN, start, secondStart);
};

/**
 * Month-to-date marker without a daily marker: everything before it is daily.
 */
export const monthlyMarkerOnlyStrategy: ExtractionStrategy<DailySection> = (text) => {
  const monthly = text.match(MONTHLY_REPORT_MARKER_RE);
  if (!monthly || monthly.index === undefined || monthly.index === 0) return undefined;

  return span(text, ReportLayout.TWO_SECTION, 0, monthly.index);
};

/**
 * Earliest layout: no markers at all, but a table header is present.
 */
export const singleSectionStrategy: ExtractionStrategy<DailySection> = (text) => {
  if (DAILY_REPORT_MARKER_RE.test(text) || MONTHLY_REPORT_MARKER_RE.test(text)) return undefined;
  if (!hasTableAnchor(text)) return undefined;

  return span(text, ReportLayout.SINGLE_SECTION, 0, text.length);
};

export const SECTION_STRATEGIES: ExtractionStrategy<DailySection>[] = [
  dailyMarkerStrategy,
  repeatedHeaderStrategy,
  monthlyMarkerOnlyStrategy,
  singleSectionStrategy,
];

export function locateDailySection(fullText: string): Extraction<DailySection> {
  return toExtraction(
    tryExtractionStrategies(fullText, SECTION_STRATEGIES),
    ParseFailureReason.SECTION_NOT_FOUND
  );
}
