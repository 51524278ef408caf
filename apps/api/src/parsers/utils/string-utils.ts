/**
 * Shared string utility functions for parsers
 */

/**
 * Parse an integer that may carry thousands separators
 *
 * @param value - Digits with optional comma separators (e.g., "1,575,850", "320")
 * @returns Parsed integer, or undefined when the value is not a plain integer
 *
 * @example
 * parseInteger("1,575,850") // 1575850
 * parseInteger("320")       // 320
 * parseInteger("3.5")       // undefined
 */
export function parseInteger(value: string): number | undefined {
  const cleaned = value.trim().replace(/,/g, '');
  if (!/^\d+$/.test(cleaned)) return undefined;
  const parsed = parseInt(cleaned, 10);
  return Number.isSafeInteger(parsed) ? parsed : undefined;
}

/**
 * Parse a signed decimal such as a per-bag deviation
 *
 * @example
 * parseSignedDecimal("-0.0414") // -0.0414
 * parseSignedDecimal("+.5")     // 0.5
 * parseSignedDecimal("abc")     // undefined
 */
export function parseSignedDecimal(value: string): number | undefined {
  const trimmed = value.trim();
  if (!/^[-+]?(?:\d+(?:\.\d*)?|\.\d+)$/.test(trimmed)) return undefined;
  const parsed = Number(trimmed);
  return Number.isFinite(parsed) ? parsed : undefined;
}
