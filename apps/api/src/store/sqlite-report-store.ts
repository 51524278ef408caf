import fs from 'fs';
import path from 'path';

import type { ReportRecord } from '@weighbridge/shared-types';
import Database from 'better-sqlite3';

import { StoreUnavailableError, errorMessage } from '../errors.js';

import { BAG_WEIGHT_COLUMN, REPORTS_TABLE, type PerBagRow, type ReportStore } from './report-store.js';

interface ReportRow {
  date: string;
  short: number;
  excess: number;
  per_bag_short_excess: number;
  bag_weight: number;
  email_subject: string | null;
  email_received: string | null;
}

interface ColumnInfoRow {
  name: string;
}

const SELECT_COLUMNS = `date, short, excess, per_bag_short_excess, bag_weight, email_subject, email_received`;
const COMPLETE_ROW = `per_bag_short_excess IS NOT NULL AND ${BAG_WEIGHT_COLUMN} IS NOT NULL`;

function toRecord(row: ReportRow): ReportRecord {
  return {
    date: row.date,
    shortKg: row.short,
    excessKg: row.excess,
    perBagShortExcess: row.per_bag_short_excess,
    bagWeightKg: row.bag_weight,
    sourceSubject: row.email_subject ?? '',
    sourceReceivedAt: row.email_received ?? '',
  };
}

export class SqliteReportStore implements ReportStore {
  private txDepth = 0;

  constructor(private readonly db: Database.Database) {}

  /**
   * Open (or create) a database file. Parent directories are created;
   * ":memory:" opens a private in-memory database.
   */
  static open(filename: string): SqliteReportStore {
    try {
      if (filename !== ':memory:') {
        fs.mkdirSync(path.dirname(filename), { recursive: true });
      }
      const db = new Database(filename);
      if (filename !== ':memory:') {
        db.pragma('journal_mode = WAL');
      }
      return new SqliteReportStore(db);
    } catch (error) {
      throw new StoreUnavailableError(`Cannot open report database ${filename}: ${errorMessage(error)}`, {
        cause: error,
      });
    }
  }

  private call<T>(operation: string, fn: () => T): Promise<T> {
    try {
      return Promise.resolve(fn());
    } catch (error) {
      return Promise.reject(
        new StoreUnavailableError(`Report store ${operation} failed: ${errorMessage(error)}`, { cause: error })
      );
    }
  }

  ensureTable(): Promise<void> {
    return this.call('ensureTable', () => {
      this.db.exec(`
        CREATE TABLE IF NOT EXISTS ${REPORTS_TABLE} (
          date                 TEXT PRIMARY KEY,
          short                INTEGER,
          excess               INTEGER,
          per_bag_short_excess REAL,
          ${BAG_WEIGHT_COLUMN}           REAL,
          email_subject        TEXT,
          email_received       TEXT
        );
      `);
    });
  }

  hasColumn(column: string): Promise<boolean> {
    return this.call('hasColumn', () => {
      const columns = this.db.prepare<[], ColumnInfoRow>(`PRAGMA table_info(${REPORTS_TABLE})`).all();
      return columns.some((c) => c.name === column);
    });
  }

  addBagWeightColumn(): Promise<void> {
    return this.call('addBagWeightColumn', () => {
      this.db.exec(`ALTER TABLE ${REPORTS_TABLE} ADD COLUMN ${BAG_WEIGHT_COLUMN} REAL`);
    });
  }

  listPerBagValues(): Promise<PerBagRow[]> {
    return this.call('listPerBagValues', () =>
      this.db
        .prepare<[], { date: string; per_bag_short_excess: number | null }>(
          `SELECT date, per_bag_short_excess FROM ${REPORTS_TABLE} ORDER BY date`
        )
        .all()
        .map((row) => ({ date: row.date, perBagShortExcess: row.per_bag_short_excess }))
    );
  }

  setBagWeight(date: string, bagWeightKg: number): Promise<void> {
    return this.call('setBagWeight', () => {
      this.db
        .prepare<[number, string]>(`UPDATE ${REPORTS_TABLE} SET ${BAG_WEIGHT_COLUMN} = ? WHERE date = ?`)
        .run(bagWeightKg, date);
    });
  }

  getAll(): Promise<ReportRecord[]> {
    return this.call('getAll', () =>
      this.db
        .prepare<[], ReportRow>(
          `SELECT ${SELECT_COLUMNS} FROM ${REPORTS_TABLE} WHERE ${COMPLETE_ROW} ORDER BY date`
        )
        .all()
        .map(toRecord)
    );
  }

  getByRange(fromDate: string, toDate: string): Promise<ReportRecord[]> {
    return this.call('getByRange', () =>
      this.db
        .prepare<[string, string], ReportRow>(
          `SELECT ${SELECT_COLUMNS} FROM ${REPORTS_TABLE}
           WHERE date >= ? AND date <= ? AND ${COMPLETE_ROW}
           ORDER BY date`
        )
        .all(fromDate, toDate)
        .map(toRecord)
    );
  }

  getByKey(date: string): Promise<ReportRecord | null> {
    return this.call('getByKey', () => {
      const row = this.db
        .prepare<[string], ReportRow>(
          `SELECT ${SELECT_COLUMNS} FROM ${REPORTS_TABLE} WHERE date = ? AND ${COMPLETE_ROW}`
        )
        .get(date);
      return row ? toRecord(row) : null;
    });
  }

  exists(date: string): Promise<boolean> {
    return this.call('exists', () => {
      const row = this.db
        .prepare<[string], { found: number }>(`SELECT 1 AS found FROM ${REPORTS_TABLE} WHERE date = ?`)
        .get(date);
      return row !== undefined;
    });
  }

  upsertByKey(date: string, record: ReportRecord): Promise<void> {
    return this.call('upsertByKey', () => {
      this.db
        .prepare<[string, number, number, number, number, string, string]>(
          `INSERT OR REPLACE INTO ${REPORTS_TABLE}
           (date, short, excess, per_bag_short_excess, ${BAG_WEIGHT_COLUMN}, email_subject, email_received)
           VALUES (?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          date,
          record.shortKg,
          record.excessKg,
          record.perBagShortExcess,
          record.bagWeightKg,
          record.sourceSubject,
          record.sourceReceivedAt
        );
    });
  }

  deleteByKey(date: string): Promise<boolean> {
    return this.call('deleteByKey', () => {
      const result = this.db
        .prepare<[string]>(`DELETE FROM ${REPORTS_TABLE} WHERE date = ? AND ${COMPLETE_ROW}`)
        .run(date);
      return result.changes > 0;
    });
  }

  // Async-safe transaction wrapper (better-sqlite3's transaction(fn) only takes sync functions)
  async runInTransaction<T>(fn: () => Promise<T>): Promise<T> {
    // allow nested calls safely
    if (this.txDepth > 0) return fn();

    this.txDepth++;
    try {
      await this.call('begin', () => this.db.exec('BEGIN IMMEDIATE;'));
      const out = await fn();
      await this.call('commit', () => this.db.exec('COMMIT;'));
      return out;
    } catch (e) {
      if (this.db.inTransaction) {
        this.db.exec('ROLLBACK;');
      }
      throw e;
    } finally {
      this.txDepth--;
    }
  }

  close(): Promise<void> {
    return this.call('close', () => {
      this.db.close();
    });
  }
}
