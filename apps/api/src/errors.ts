import { SyncErrorCode } from '@weighbridge/shared-types';

/**
 * Failures that end a sync session. Per-message parse problems are not
 * errors and never reach this hierarchy.
 */
export class SyncError extends Error {
  readonly code: SyncErrorCode;
  readonly statusCode: number;

  constructor(code: SyncErrorCode, message: string, statusCode: number, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SyncError';
    this.code = code;
    this.statusCode = statusCode;
  }
}

export class SourceUnavailableError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SyncErrorCode.SOURCE_UNAVAILABLE, message, 503, options);
    this.name = 'SourceUnavailableError';
  }
}

export class StoreUnavailableError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SyncErrorCode.STORE_UNAVAILABLE, message, 503, options);
    this.name = 'StoreUnavailableError';
  }
}

export class SchemaMigrationFailedError extends SyncError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(SyncErrorCode.SCHEMA_MIGRATION_FAILED, message, 500, options);
    this.name = 'SchemaMigrationFailedError';
  }
}

export class RecordNotFoundError extends Error {
  readonly statusCode = 404;

  constructor(date: string) {
    super(`No report stored for ${date}`);
    this.name = 'RecordNotFoundError';
  }
}

export class SyncInProgressError extends Error {
  readonly statusCode = 409;

  constructor() {
    super('A sync is already running');
    this.name = 'SyncInProgressError';
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
