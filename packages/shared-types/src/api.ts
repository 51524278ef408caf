import type {
  FilterRejectionReason,
  ParseFailureReason,
  SyncState,
  UpsertStatus,
} from './enums.js';
import type { ReportRecord } from './domain.js';

export interface SyncRequest {
  fromDate: string;
  toDate: string;
}

export type SyncItemOutcome = 'ACCEPTED' | 'SUPERSEDED' | 'SKIPPED' | 'FAILED';

export interface SyncItemDiagnostic {
  subject: string;
  receivedAt: string;
  outcome: SyncItemOutcome;
  reportDate?: string;
  reason?: ParseFailureReason | FilterRejectionReason;
}

export interface SyncFailure {
  subject: string;
  reason: ParseFailureReason;
}

export interface MigrationResult {
  migrated: boolean;
  backfilled: number;
}

export interface UpsertItemResult {
  date: string;
  status: UpsertStatus;
}

export interface UpsertResult {
  insertedOrReplaced: number;
  perItemResult: UpsertItemResult[];
}

export interface SyncSummary {
  state: SyncState;
  fromDate: string;
  toDate: string;
  processedCount: number;
  /** Messages excluded by the sender/subject filter */
  skippedCount: number;
  /** Messages that passed the filter but could not be parsed */
  failedCount: number;
  /** Parsed reports dropped in favour of a later message for the same date */
  supersededCount: number;
  syncedCount: number;
  failures: SyncFailure[];
  items: SyncItemDiagnostic[];
  upserts: UpsertItemResult[];
  /** Present when the session ran the schema migration itself */
  migration?: MigrationResult;
  /** Set when the session ended in FAILED */
  error?: {
    code: string;
    message: string;
  };
}

export interface GetReportsResponse {
  reports: ReportRecord[];
  total: number;
}

export interface UpdateReportRequest {
  shortKg: number;
  excessKg: number;
  perBagShortExcess: number;
}

export interface DeleteReportResponse {
  success: boolean;
  date: string;
}

export interface ReportRangeSummary {
  fromDate: string | null;
  toDate: string | null;
  days: number;
  totalShortKg: number;
  totalExcessKg: number;
  averageBagWeightKg: number | null;
  averagePerBagShortExcess: number | null;
}

export interface ErrorResponse {
  error: string;
  message: string;
  statusCode: number;
  code?: string;
  details?: unknown;
}
