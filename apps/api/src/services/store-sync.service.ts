import {
  UpsertStatus,
  type MigrationResult,
  type ReportRecord,
  type UpsertItemResult,
  type UpsertResult,
} from '@weighbridge/shared-types';

import { SchemaMigrationFailedError, StoreUnavailableError, SyncError, errorMessage } from '../errors.js';
import { NOMINAL_BAG_WEIGHT_KG } from '../parsers/constants.js';
import { computeBagWeight } from '../parsers/weighbridge/record-builder.js';
import { BAG_WEIGHT_COLUMN, type ReportStore } from '../store/report-store.js';
import { logger } from '../utils/sentry.js';

export interface UpsertOptions {
  /** Checked before each row write; rows already written stay committed */
  signal?: AbortSignal;
}

function sameRecord(a: ReportRecord, b: ReportRecord): boolean {
  return (
    a.date === b.date &&
    a.shortKg === b.shortKg &&
    a.excessKg === b.excessKg &&
    a.perBagShortExcess === b.perBagShortExcess &&
    a.bagWeightKg === b.bagWeightKg &&
    a.sourceSubject === b.sourceSubject &&
    a.sourceReceivedAt === b.sourceReceivedAt
  );
}

/**
 * Keeps the report table in shape and writes reconciled records into it.
 *
 * `initialize` must succeed before `upsert` is accepted. A failed migration
 * leaves the synchronizer blocked until `initialize` is retried successfully.
 */
export class StoreSynchronizer {
  private ready = false;

  constructor(
    private readonly store: ReportStore,
    private readonly nominalBagWeight: number = NOMINAL_BAG_WEIGHT_KG
  ) {}

  get isReady(): boolean {
    return this.ready;
  }

  /**
   * Create the table if needed, then add and backfill `bag_weight` when an
   * older table lacks it. Running it again is a no-op.
   */
  async initialize(): Promise<MigrationResult> {
    this.ready = false;

    let result: MigrationResult;
    try {
      result = await this.store.runInTransaction(async () => {
        await this.store.ensureTable();
        if (await this.store.hasColumn(BAG_WEIGHT_COLUMN)) {
          return { migrated: false, backfilled: 0 };
        }

        console.log(`[MIGRATE] Adding ${BAG_WEIGHT_COLUMN} column`);
        await this.store.addBagWeightColumn();

        let backfilled = 0;
        for (const row of await this.store.listPerBagValues()) {
          if (row.perBagShortExcess === null) continue;
          await this.store.setBagWeight(row.date, computeBagWeight(row.perBagShortExcess, this.nominalBagWeight));
          backfilled++;
        }
        console.log(`[MIGRATE] Backfilled ${backfilled} rows`);
        return { migrated: true, backfilled };
      });
    } catch (error) {
      logger.fatal('Schema migration failed', { error: errorMessage(error) });
      throw new SchemaMigrationFailedError(`Schema migration failed: ${errorMessage(error)}`, { cause: error });
    }

    this.ready = true;
    if (result.migrated) {
      logger.info('Schema migration completed', { backfilled: result.backfilled });
    }
    return result;
  }

  /**
   * Insert or replace each record by date. Each row write is atomic; the
   * batch is not, so a failure part way leaves earlier rows in place.
   */
  async upsert(records: Iterable<ReportRecord>, options: UpsertOptions = {}): Promise<UpsertResult> {
    if (!this.ready) {
      throw new SchemaMigrationFailedError('Report store schema has not been initialized');
    }

    const perItemResult: UpsertItemResult[] = [];
    let insertedOrReplaced = 0;

    try {
      for (const record of records) {
        if (options.signal?.aborted) break;

        const existing = await this.store.getByKey(record.date);
        if (existing && sameRecord(existing, record)) {
          perItemResult.push({ date: record.date, status: UpsertStatus.UNCHANGED });
          continue;
        }

        // An incomplete legacy row is not returned by getByKey but still occupies the date
        const replacing = existing !== null || (await this.store.exists(record.date));
        await this.store.upsertByKey(record.date, record);
        insertedOrReplaced++;
        const status = replacing ? UpsertStatus.REPLACED : UpsertStatus.INSERTED;
        perItemResult.push({ date: record.date, status });
        console.log(`[SYNC] ${status} ${record.date}`);
      }
    } catch (error) {
      if (error instanceof SyncError) throw error;
      throw new StoreUnavailableError(`Report store write failed: ${errorMessage(error)}`, { cause: error });
    }

    return { insertedOrReplaced, perItemResult };
  }
}
