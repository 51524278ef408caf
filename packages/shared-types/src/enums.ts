export enum ParseFailureReason {
  DATE_NOT_FOUND = 'DATE_NOT_FOUND',
  SECTION_NOT_FOUND = 'SECTION_NOT_FOUND',
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  PER_BAG_VALUE_NOT_FOUND = 'PER_BAG_VALUE_NOT_FOUND',
}

export enum FilterRejectionReason {
  SENDER_MISMATCH = 'SENDER_MISMATCH',
  SUBJECT_MISMATCH = 'SUBJECT_MISMATCH',
}

export enum SyncErrorCode {
  DATE_NOT_FOUND = 'DATE_NOT_FOUND',
  SECTION_NOT_FOUND = 'SECTION_NOT_FOUND',
  TABLE_NOT_FOUND = 'TABLE_NOT_FOUND',
  PER_BAG_VALUE_NOT_FOUND = 'PER_BAG_VALUE_NOT_FOUND',
  SENDER_MISMATCH = 'SENDER_MISMATCH',
  SUBJECT_MISMATCH = 'SUBJECT_MISMATCH',
  SOURCE_UNAVAILABLE = 'SOURCE_UNAVAILABLE',
  STORE_UNAVAILABLE = 'STORE_UNAVAILABLE',
  SCHEMA_MIGRATION_FAILED = 'SCHEMA_MIGRATION_FAILED',
}

export enum ReportLayout {
  /** Earliest layout: one table, no month-to-date part */
  SINGLE_SECTION = 'SINGLE_SECTION',
  /** "Daily Report" followed by "Monthly to Date Report" */
  TWO_SECTION = 'TWO_SECTION',
  /** "Delivery Information" block with the table header repeated, stacked or side by side */
  TWO_COLUMN = 'TWO_COLUMN',
  UNKNOWN = 'UNKNOWN',
}

export enum SyncState {
  IDLE = 'IDLE',
  FETCHING = 'FETCHING',
  FILTERING = 'FILTERING',
  PARSING = 'PARSING',
  RECONCILING = 'RECONCILING',
  PERSISTING = 'PERSISTING',
  DONE = 'DONE',
  FAILED = 'FAILED',
  CANCELLED = 'CANCELLED',
}

export enum UpsertStatus {
  INSERTED = 'INSERTED',
  REPLACED = 'REPLACED',
  UNCHANGED = 'UNCHANGED',
}
