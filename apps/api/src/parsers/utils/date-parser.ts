/**
 * Shared date parsing utilities for weigh-bridge report parsers
 *
 * Handles the day-month-year forms found in report bodies and subjects:
 * - Date: 05-Jan-2024
 * - 05/Jan/2024
 * - 5 January 24
 *
 * Returns dates in ISO format (YYYY-MM-DD)
 */

import { ParseFailureReason } from '@weighbridge/shared-types';

import { BARE_DATE_RE, LABELLED_DATE_RE, MONTH_ABBREVIATIONS } from '../constants.js';

import { found, notFound, type Extraction } from './extraction-patterns.js';

/**
 * Get the century prefix for two-digit years (e.g., "20" for 21st century)
 *
 * @example
 * getCenturyPrefix() // "20" (in year 2025)
 */
export function getCenturyPrefix(): string {
  const currentYear = new Date().getFullYear();
  return Math.floor(currentYear / 100).toString();
}

/**
 * Map a month name to its number (1-12). Only the first three letters are
 * significant, so "Jan", "JAN" and "January" all map to 1.
 */
export function monthFromName(name: string): number | undefined {
  if (name.length < 3) return undefined;
  const abbreviation = name.slice(0, 3).toLowerCase();
  const index = MONTH_ABBREVIATIONS.findIndex((m) => m === abbreviation);
  return index >= 0 ? index + 1 : undefined;
}

/**
 * Validate that year/month/day name a real calendar day (leap years included)
 *
 * @example
 * isValidCalendarDate(2024, 2, 29) // true
 * isValidCalendarDate(2023, 2, 29) // false
 */
export function isValidCalendarDate(year: number, month: number, day: number): boolean {
  if (month < 1 || month > 12 || day < 1) return false;
  const dt = new Date(Date.UTC(year, month - 1, day));
  return dt.getUTCFullYear() === year && dt.getUTCMonth() === month - 1 && dt.getUTCDate() === day;
}

function toIsoDate(year: number, month: number, day: number): string {
  return `${String(year).padStart(4, '0')}-${String(month).padStart(2, '0')}-${String(day).padStart(2, '0')}`;
}

/**
 * Convert captured day, month-name and year tokens to an ISO date
 *
 * @returns ISO date string or undefined when the month is unknown or the day does not exist
 */
export function parseDayMonthYear(day: string, monthName: string, year: string): string | undefined {
  const month = monthFromName(monthName);
  if (!month) return undefined;

  const fullYear = parseInt(year.length === 2 ? `${getCenturyPrefix()}${year}` : year, 10);
  const dayNum = parseInt(day, 10);

  if (!isValidCalendarDate(fullYear, month, dayNum)) return undefined;
  return toIsoDate(fullYear, month, dayNum);
}

function firstValidTriple(text: string, pattern: RegExp): string | undefined {
  for (const match of text.matchAll(pattern)) {
    const [, day, monthName, year] = match;
    if (!day || !monthName || !year) continue;
    const iso = parseDayMonthYear(day, monthName, year);
    if (iso) return iso;
  }
  return undefined;
}

/**
 * Resolve the report date from a message
 *
 * The labelled form ("Date: 05-Jan-2024") wins over a bare triple anywhere in
 * the text. When the body carries neither, the same two forms are tried
 * against `fallbackText` (the subject line).
 */
export function resolveReportDate(text: string, fallbackText?: string): Extraction<string> {
  const sources = fallbackText ? [text, fallbackText] : [text];

  for (const source of sources) {
    const iso = firstValidTriple(source, LABELLED_DATE_RE) ?? firstValidTriple(source, BARE_DATE_RE);
    if (iso) return found(iso);
  }

  return notFound(ParseFailureReason.DATE_NOT_FOUND);
}

/**
 * Add days to an ISO date string using UTC-safe arithmetic
 *
 * @param isoDate - Date string in ISO format (YYYY-MM-DD)
 * @param days - Number of days to add (can be negative for subtraction)
 * @returns New ISO date string (YYYY-MM-DD)
 */
export function addDaysUtc(isoDate: string, days: number): string {
  const [y, m, d] = isoDate.split('-').map(Number);
  if (!y || !m || !d) return isoDate;
  const dt = new Date(Date.UTC(y, m - 1, d));
  dt.setUTCDate(dt.getUTCDate() + days);
  return dt.toISOString().slice(0, 10);
}

/**
 * First and last day of a YYYY-MM month
 *
 * @example
 * getMonthRange('2024-02') // { fromDate: '2024-02-01', toDate: '2024-02-29' }
 */
export function getMonthRange(month: string): { fromDate: string; toDate: string } {
  const [y, m] = month.split('-').map(Number);
  if (!y || !m || m < 1 || m > 12) {
    throw new Error(`Invalid month: ${month}`);
  }
  const fromDate = toIsoDate(y, m, 1);
  const nextMonth = m === 12 ? toIsoDate(y + 1, 1, 1) : toIsoDate(y, m + 1, 1);
  return { fromDate, toDate: addDaysUtc(nextMonth, -1) };
}

/**
 * Convert an inclusive calendar window to a half-open [start, end) instant range
 * in local time, matching how mail clients report received times.
 */
export function windowToInstants(fromDate: string, toDate: string): { start: Date; end: Date } {
  const [fy, fm, fd] = fromDate.split('-').map(Number);
  const end = addDaysUtc(toDate, 1);
  const [ty, tm, td] = end.split('-').map(Number);
  if (!fy || !fm || !fd || !ty || !tm || !td) {
    throw new Error(`Invalid date window: ${fromDate}..${toDate}`);
  }
  return {
    start: new Date(fy, fm - 1, fd),
    end: new Date(ty, tm - 1, td),
  };
}
