import type { ReportRecord } from '@weighbridge/shared-types';

export const REPORTS_TABLE = 'delivery_reports';
export const BAG_WEIGHT_COLUMN = 'bag_weight';

export interface PerBagRow {
  date: string;
  perBagShortExcess: number | null;
}

/**
 * Keyed record store for daily reports, keyed by ISO date.
 *
 * Reads and deletes only see complete rows; a legacy row without a per-bag
 * value is visible to the migration through `listPerBagValues` and to
 * `exists`, and is overwritten by `upsertByKey`.
 */
export interface ReportStore {
  /** Create the reports table when it does not exist yet */
  ensureTable(): Promise<void>;
  hasColumn(column: string): Promise<boolean>;
  addBagWeightColumn(): Promise<void>;
  listPerBagValues(): Promise<PerBagRow[]>;
  setBagWeight(date: string, bagWeightKg: number): Promise<void>;

  getAll(): Promise<ReportRecord[]>;
  /** Inclusive range, ordered by date */
  getByRange(fromDate: string, toDate: string): Promise<ReportRecord[]>;
  getByKey(date: string): Promise<ReportRecord | null>;
  /** Whether any row, complete or not, is stored for the date */
  exists(date: string): Promise<boolean>;
  /** Insert, or replace the whole row when the date already exists */
  upsertByKey(date: string, record: ReportRecord): Promise<void>;
  /** @returns whether a complete row was removed */
  deleteByKey(date: string): Promise<boolean>;

  runInTransaction<T>(fn: () => Promise<T>): Promise<T>;
  close(): Promise<void>;
}
