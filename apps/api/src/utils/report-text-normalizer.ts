/**
 * Text normalization for report bodies exported by different mail clients
 */

/**
 * Normalize a report body so the parsers see one whitespace convention
 *
 * Mail clients render the same HTML table with CRLF line endings, non-breaking
 * spaces, tabs between cells or zero-width characters; all of these become
 * plain spaces and LF line endings.
 */
export function normalizeReportText(text: string): string {
  if (!text) return '';

  return (
    text
      // Normalize line endings
      .replace(/\r\n/g, '\n')
      .replace(/\r/g, '\n')
      // Zero-width characters and BOM
      .replace(/[\u200B-\u200D\uFEFF]/g, '')
      // Non-breaking and other unicode spaces
      .replace(/[\u00A0\u2007\u202F]/g, ' ')
      // Tabs between table cells
      .replace(/\t/g, ' ')
      // Remove trailing whitespace from lines
      .replace(/[ ]+$/gm, '')
      .trim()
  );
}
