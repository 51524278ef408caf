// Shared parsing constants for weigh-bridge report parsers

export { NOMINAL_BAG_WEIGHT_KG } from '@weighbridge/shared-config';

export const MONTH_ABBREVIATIONS = [
  'jan',
  'feb',
  'mar',
  'apr',
  'may',
  'jun',
  'jul',
  'aug',
  'sep',
  'oct',
  'nov',
  'dec',
] as const;

// Day-month-year triple: 05-Jan-2024, 5/January/24, 05 Jan 2024
export const DATE_TRIPLE_PATTERN =
  '(\\d{1,2})\\s*[-/\\s]\\s*([A-Za-z]{3,9})\\.?\\s*[-/\\s]\\s*(\\d{4}|\\d{2})(?!\\d)';
export const LABELLED_DATE_RE = new RegExp(`Date\\s*:\\s*${DATE_TRIPLE_PATTERN}`, 'gi');
export const BARE_DATE_RE = new RegExp(`(?<!\\d)${DATE_TRIPLE_PATTERN}`, 'g');

// Section markers
export const DAILY_REPORT_MARKER_RE = /Daily\s+Report/i;
export const MONTHLY_REPORT_MARKER_RE = /Monthly\s+to\s+Date(?:\s+Report)?/i;
export const DELIVERY_INFORMATION_MARKER_RE = /Delivery\s+Information\s*:?(?:\s*Bag\s+Cement)?/i;

// Table headers, words separated by any whitespace including newlines
export const FULL_TABLE_HEADER_PATTERN =
  'Total\\s+Delivery\\s+Bag\\s+Weight\\s+Physical\\s+Weight\\s+Short\\s+Excess';
export const FULL_TABLE_HEADER_RE = new RegExp(FULL_TABLE_HEADER_PATTERN, 'i');
export const FULL_TABLE_HEADER_GLOBAL_RE = new RegExp(FULL_TABLE_HEADER_PATTERN, 'gi');
export const ANCHORED_TABLE_HEADER_RE = /Physical\s+Weight\s+Short\s+Excess/i;
export const SHORT_EXCESS_HEADER_RE = /Short\s+Excess/i;

// Integer with optional thousands separators: 1575850 or 1,575,850
export const INTEGER_PATTERN = '(\\d{1,3}(?:,\\d{3})+|\\d+)';
export const FIVE_INTEGER_ROW_RE = new RegExp(
  `(?<![\\d.,])${Array(5).fill(INTEGER_PATTERN).join('\\s+')}(?![.,]?\\d)`
);

// Per Bag Short: -0.0414 / Per Bags Short/Excess: 0.12
export const PER_BAG_VALUE_RE =
  /Per\s+Bags?\s+Short(?:\s*\/\s*Excess)?\s*:\s*([-+]?(?:\d+(?:\.\d*)?|\.\d+))/i;

// Table column positions (0-based) in the five-column delivery row
export const COLUMN_TOTAL_DELIVERY = 0;
export const COLUMN_BAG_WEIGHT = 1;
export const COLUMN_PHYSICAL_WEIGHT = 2;
export const COLUMN_SHORT = 3;
export const COLUMN_EXCESS = 4;
