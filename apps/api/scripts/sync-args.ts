import type { DateWindow } from '@weighbridge/shared-types';
import { MonthSchema, SyncRequestSchema } from '@weighbridge/shared-validation';

import { getMonthRange } from '../src/parsers/utils/date-parser.js';

export const USAGE = 'Usage: sync --from YYYY-MM-DD --to YYYY-MM-DD | --month YYYY-MM';

export function parseSyncArgs(argv: string[]): DateWindow {
  const values = new Map<string, string>();
  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];
    const value = argv[i + 1];
    if ((flag === '--from' || flag === '--to' || flag === '--month') && value && !value.startsWith('--')) {
      values.set(flag.slice(2), value);
      i++;
    } else {
      throw new Error(`Unexpected argument '${flag}'\n${USAGE}`);
    }
  }

  const month = values.get('month');
  if (month) {
    if (values.has('from') || values.has('to')) {
      throw new Error(`Use either --month or --from/--to\n${USAGE}`);
    }
    return getMonthRange(MonthSchema.parse(month));
  }

  const from = values.get('from');
  if (!from) {
    throw new Error(USAGE);
  }
  return SyncRequestSchema.parse({ fromDate: from, toDate: values.get('to') ?? from });
}
