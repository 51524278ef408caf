import type { SyncHeuristicsConfig } from '@weighbridge/shared-config';
import {
  SyncState,
  type CandidateReport,
  type DateWindow,
  type SourceMessage,
  type SyncItemDiagnostic,
  type SyncSummary,
} from '@weighbridge/shared-types';

import { SourceUnavailableError, StoreUnavailableError, SyncError, errorMessage } from '../errors.js';
import { parseReport } from '../parsers/weighbridge/report.parser.js';
import type { MessageSource } from '../sources/message-source.js';
import { addBreadcrumb, logger } from '../utils/sentry.js';

import { filterMessage } from './message-filter.service.js';
import { reconcileCandidates } from './reconcile.service.js';
import type { StoreSynchronizer } from './store-sync.service.js';

const TRANSITIONS: Record<SyncState, readonly SyncState[]> = {
  [SyncState.IDLE]: [SyncState.FETCHING, SyncState.CANCELLED],
  [SyncState.FETCHING]: [SyncState.FILTERING, SyncState.FAILED, SyncState.CANCELLED],
  [SyncState.FILTERING]: [SyncState.PARSING, SyncState.FAILED, SyncState.CANCELLED],
  [SyncState.PARSING]: [SyncState.RECONCILING, SyncState.FAILED, SyncState.CANCELLED],
  [SyncState.RECONCILING]: [SyncState.PERSISTING, SyncState.FAILED, SyncState.CANCELLED],
  [SyncState.PERSISTING]: [SyncState.DONE, SyncState.FAILED, SyncState.CANCELLED],
  [SyncState.DONE]: [],
  [SyncState.FAILED]: [],
  [SyncState.CANCELLED]: [],
};

export type StateChangeListener = (state: SyncState, previous: SyncState) => void;

export interface SyncSessionOptions {
  source: MessageSource;
  synchronizer: StoreSynchronizer;
  heuristics: SyncHeuristicsConfig;
  onStateChange?: StateChangeListener;
}

export interface SyncRunOptions {
  /** Cooperative cancellation, checked between messages and between record writes */
  signal?: AbortSignal;
}

export class IllegalStateTransitionError extends Error {
  constructor(from: SyncState, to: SyncState) {
    super(`Illegal sync state transition ${from} -> ${to}`);
    this.name = 'IllegalStateTransitionError';
  }
}

/**
 * One pass of fetch, filter, parse, reconcile and persist over a date window.
 *
 * A session runs once. Per-message problems end up in the summary; only
 * source and store failures reject, after the session has moved to FAILED.
 * The session enters FETCHING before calling the source, so an unreachable
 * source ends as FETCHING -> FAILED; nothing fails straight from IDLE.
 */
export class SyncSession {
  private currentState: SyncState = SyncState.IDLE;
  private currentSummary: SyncSummary | null = null;

  constructor(private readonly options: SyncSessionOptions) {}

  get state(): SyncState {
    return this.currentState;
  }

  /** Summary of the last run, including a failed one */
  get summary(): SyncSummary | null {
    return this.currentSummary;
  }

  private transition(next: SyncState): void {
    const previous = this.currentState;
    if (!TRANSITIONS[previous].includes(next)) {
      throw new IllegalStateTransitionError(previous, next);
    }
    this.currentState = next;
    if (this.currentSummary) this.currentSummary.state = next;
    addBreadcrumb(`Sync state ${previous} -> ${next}`, 'sync');
    this.options.onStateChange?.(next, previous);
  }

  private cancel(summary: SyncSummary): SyncSummary {
    this.transition(SyncState.CANCELLED);
    console.log(`[SYNC] Cancelled after ${summary.syncedCount} records`);
    logger.warn('Sync session cancelled', { fromDate: summary.fromDate, toDate: summary.toDate });
    return summary;
  }

  async run(window: DateWindow, runOptions: SyncRunOptions = {}): Promise<SyncSummary> {
    const { signal } = runOptions;
    const { source, synchronizer, heuristics } = this.options;

    if (this.currentState !== SyncState.IDLE) {
      throw new IllegalStateTransitionError(this.currentState, SyncState.FETCHING);
    }

    const summary: SyncSummary = {
      state: this.currentState,
      fromDate: window.fromDate,
      toDate: window.toDate,
      processedCount: 0,
      skippedCount: 0,
      failedCount: 0,
      supersededCount: 0,
      syncedCount: 0,
      failures: [],
      items: [],
      upserts: [],
    };
    this.currentSummary = summary;

    if (signal?.aborted) return this.cancel(summary);

    logger.info('Sync session started', { fromDate: window.fromDate, toDate: window.toDate });
    console.log(`[SYNC] Session ${window.fromDate}..${window.toDate}`);

    try {
      this.transition(SyncState.FETCHING);
      let messages: SourceMessage[];
      try {
        messages = await source.fetchMessages(window);
      } catch (error) {
        if (error instanceof SyncError) throw error;
        throw new SourceUnavailableError(`Message source failed: ${errorMessage(error)}`, { cause: error });
      }
      summary.processedCount = messages.length;
      console.log(`[SYNC] Fetched ${messages.length} messages`);

      this.transition(SyncState.FILTERING);
      const accepted: Array<{ message: SourceMessage; item: SyncItemDiagnostic }> = [];
      for (const message of messages) {
        if (signal?.aborted) return this.cancel(summary);

        const item: SyncItemDiagnostic = {
          subject: message.subject,
          receivedAt: message.receivedAt.toISOString(),
          outcome: 'SKIPPED',
        };
        summary.items.push(item);

        const decision = filterMessage(message, heuristics);
        if (!decision.accepted) {
          item.reason = decision.reason;
          summary.skippedCount++;
          console.log(`[SYNC] Skipped "${message.subject}": ${decision.reason}`);
          continue;
        }
        accepted.push({ message, item });
      }

      this.transition(SyncState.PARSING);
      const parsed: Array<{ candidate: CandidateReport; item: SyncItemDiagnostic }> = [];
      for (const { message, item } of accepted) {
        if (signal?.aborted) return this.cancel(summary);

        const candidate = parseReport(message, { nominalBagWeight: heuristics.nominalBagWeight });
        if (!candidate.record) {
          const reason = candidate.failureReason;
          item.outcome = 'FAILED';
          item.reason = reason;
          if (reason) summary.failures.push({ subject: message.subject, reason });
          console.log(`[SYNC] Failed to parse "${message.subject}" (${candidate.layout ?? 'UNKNOWN'}): ${reason}`);
          logger.warn('Report message could not be parsed', {
            subject: message.subject,
            reason,
            layout: candidate.layout,
          });
        } else {
          item.reportDate = candidate.record.date;
        }
        parsed.push({ candidate, item });
      }

      this.transition(SyncState.RECONCILING);
      const reconciled = reconcileCandidates(parsed.map((p) => p.candidate));
      summary.failedCount = reconciled.failedCount;
      summary.supersededCount = reconciled.superseded.length;
      for (const { candidate, item } of parsed) {
        if (!candidate.record) continue;
        item.outcome = reconciled.records.get(candidate.record.date) === candidate.record ? 'ACCEPTED' : 'SUPERSEDED';
      }

      this.transition(SyncState.PERSISTING);
      if (!synchronizer.isReady) {
        summary.migration = await synchronizer.initialize();
      }
      const upsert = await synchronizer.upsert(reconciled.records.values(), { signal });
      summary.upserts = upsert.perItemResult;
      summary.syncedCount = upsert.perItemResult.length;

      if (signal?.aborted && upsert.perItemResult.length < reconciled.records.size) {
        return this.cancel(summary);
      }

      this.transition(SyncState.DONE);
      console.log(
        `[SYNC] Done: processed=${summary.processedCount} skipped=${summary.skippedCount} ` +
          `failed=${summary.failedCount} superseded=${summary.supersededCount} synced=${summary.syncedCount}`
      );
      logger.info('Sync session completed', {
        fromDate: window.fromDate,
        toDate: window.toDate,
        processedCount: summary.processedCount,
        skippedCount: summary.skippedCount,
        failedCount: summary.failedCount,
        syncedCount: summary.syncedCount,
        written: upsert.insertedOrReplaced,
      });
      return summary;
    } catch (error) {
      const fatal =
        error instanceof SyncError
          ? error
          : new StoreUnavailableError(`Sync session failed: ${errorMessage(error)}`, { cause: error });
      summary.error = { code: fatal.code, message: fatal.message };
      this.transition(SyncState.FAILED);
      console.error(`[SYNC] Failed: ${fatal.message}`);
      logger.error('Sync session failed', { code: fatal.code, message: fatal.message });
      throw fatal;
    }
  }
}
