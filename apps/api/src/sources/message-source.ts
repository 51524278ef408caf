import type { DateWindow, SourceMessage } from '@weighbridge/shared-types';

/**
 * Where report messages come from. Implementations return every message
 * received in `[fromDate 00:00, toDate + 1 day 00:00)` local time and throw
 * `SourceUnavailableError` when the source cannot be read.
 */
export interface MessageSource {
  fetchMessages(window: DateWindow): Promise<SourceMessage[]>;
}
