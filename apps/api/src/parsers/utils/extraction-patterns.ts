/**
 * Shared extraction pattern utilities for weigh-bridge parsers
 *
 * Provides reusable pattern matching strategies and the tagged result type
 * every parse stage returns.
 */

import type { ParseFailureReason } from '@weighbridge/shared-types';

/**
 * Result of a parse stage. An absent pattern is an expected outcome, so it is
 * returned as a value rather than thrown.
 */
export type Extraction<T> =
  | { found: true; value: T }
  | { found: false; reason: ParseFailureReason };

export function found<T>(value: T): Extraction<T> {
  return { found: true, value };
}

export function notFound<T = never>(reason: ParseFailureReason): Extraction<T> {
  return { found: false, reason };
}

/**
 * Strategy function type for extraction attempts
 * Returns extracted value or undefined if pattern doesn't match
 */
export type ExtractionStrategy<T> = (text: string) => T | undefined;

/**
 * Apply extraction strategies in order until one succeeds
 *
 * @param text - Text to extract from
 * @param strategies - Array of extraction strategy functions to try
 * @returns First successful extraction result, or undefined if all fail
 *
 * @example
 * const fields = tryExtractionStrategies(section, [
 *   anchoredTableStrategy,
 *   headerRelativeTableStrategy,
 * ]);
 */
export function tryExtractionStrategies<T>(
  text: string,
  strategies: ExtractionStrategy<T>[]
): T | undefined {
  for (const strategy of strategies) {
    const result = strategy(text);
    if (result !== undefined) {
      return result;
    }
  }
  return undefined;
}

/**
 * Turn an optional strategy result into a tagged extraction
 */
export function toExtraction<T>(value: T | undefined, reason: ParseFailureReason): Extraction<T> {
  return value === undefined ? notFound(reason) : found(value);
}

/**
 * Create a regex-based extraction strategy
 *
 * @example
 * const extractPerBag = createRegexStrategy(
 *   /Per\s+Bag\s+Short:\s*(-?\d+\.\d+)/i,
 *   (match) => parseFloat(match[1])
 * );
 */
export function createRegexStrategy<T>(
  pattern: RegExp,
  extractor: (match: RegExpMatchArray) => T | undefined
): ExtractionStrategy<T> {
  return (text: string): T | undefined => {
    const match = text.match(pattern);
    return match ? extractor(match) : undefined;
  };
}

/**
 * Create a header-relative extraction strategy
 *
 * Finds the first occurrence of a header and matches a value pattern only in
 * the text that follows it, optionally bounded to `maxSpan` characters.
 *
 * @example
 * const extractRow = createHeaderRelativeStrategy(
 *   /Short\s+Excess/i,
 *   /(\d+)\s+(\d+)/,
 *   (match) => [match[1], match[2]]
 * );
 */
export function createHeaderRelativeStrategy<T>(
  headerPattern: RegExp,
  valuePattern: RegExp,
  extractor: (match: RegExpMatchArray) => T | undefined,
  maxSpan?: number
): ExtractionStrategy<T> {
  return (text: string): T | undefined => {
    const headerMatch = text.match(headerPattern);
    if (!headerMatch || headerMatch.index === undefined) return undefined;

    const start = headerMatch.index + headerMatch[0].length;
    const after = maxSpan === undefined ? text.slice(start) : text.slice(start, start + maxSpan);
    const valueMatch = after.match(valuePattern);

    return valueMatch ? extractor(valueMatch) : undefined;
  };
}
