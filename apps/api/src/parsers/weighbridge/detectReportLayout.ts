import { ReportLayout } from '@weighbridge/shared-types';

import {
  DAILY_REPORT_MARKER_RE,
  DELIVERY_INFORMATION_MARKER_RE,
  MONTHLY_REPORT_MARKER_RE,
} from '../constants.js';

import { locateDailySection } from './section-locator.js';

/**
 * Classify a report body. Bodies the section locator understands get that
 * layout; otherwise the markers present give a best guess for diagnostics.
 */
export function detectReportLayout(text: string): ReportLayout {
  const section = locateDailySection(text);
  if (section.found) {
    return section.value.layout;
  }

  if (DELIVERY_INFORMATION_MARKER_RE.test(text)) {
    return ReportLayout.TWO_COLUMN;
  }

  if (DAILY_REPORT_MARKER_RE.test(text) || MONTHLY_REPORT_MARKER_RE.test(text)) {
    return ReportLayout.TWO_SECTION;
  }

  return ReportLayout.UNKNOWN;
}
