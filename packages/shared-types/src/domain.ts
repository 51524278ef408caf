import type { ParseFailureReason, ReportLayout } from './enums.js';

/**
 * One calendar day of weigh-bridge metrics. `date` is the primary key.
 */
export interface ReportRecord {
  /** ISO calendar date (YYYY-MM-DD) */
  date: string;
  shortKg: number;
  excessKg: number;
  /** Negative when bags were heavier than nominal */
  perBagShortExcess: number;
  /** Always nominal bag weight minus perBagShortExcess */
  bagWeightKg: number;
  sourceSubject: string;
  /** ISO timestamp of the message that produced this record */
  sourceReceivedAt: string;
}

export interface CandidateReport {
  record: ReportRecord | null;
  failureReason?: ParseFailureReason;
  layout?: ReportLayout;
  sourceSubject: string;
  sourceReceivedAt: string;
}

export interface SourceMessage {
  senderAddress: string;
  senderDisplayName: string;
  subject: string;
  body: string;
  receivedAt: Date;
}

export interface DateWindow {
  /** Inclusive, YYYY-MM-DD */
  fromDate: string;
  /** Inclusive, YYYY-MM-DD */
  toDate: string;
}
