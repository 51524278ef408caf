/**
 * Run one sync session from the command line against the configured
 * message source and database.
 *
 * Usage: npm run sync -- --from 2024-01-01 --to 2024-01-31
 *        npm run sync -- --month 2024-01
 */
import { loadConfig } from '@weighbridge/shared-config';
import { SyncState } from '@weighbridge/shared-types';

import { errorMessage } from '../src/errors.js';
import { StoreSynchronizer } from '../src/services/store-sync.service.js';
import { SyncSession } from '../src/services/sync-session.service.js';
import { JsonFileMessageSource } from '../src/sources/json-file-message-source.js';
import { SqliteReportStore } from '../src/store/sqlite-report-store.js';
import { trackAsyncOperation } from '../src/utils/sentry.js';

import { parseSyncArgs } from './sync-args.js';

async function main() {
  const window = parseSyncArgs(process.argv.slice(2));
  const config = loadConfig();

  const store = SqliteReportStore.open(config.database.path);
  const synchronizer = new StoreSynchronizer(store, config.sync.nominalBagWeight);
  const session = new SyncSession({
    source: new JsonFileMessageSource(config.messageSource.path),
    synchronizer,
    heuristics: config.sync,
    onStateChange: (state) => console.error(`[SYNC] ${state}`),
  });

  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort());

  try {
    const summary = await trackAsyncOperation(
      'sync.session',
      () => session.run(window, { signal: controller.signal }),
      { fromDate: window.fromDate, toDate: window.toDate }
    );
    console.log(JSON.stringify(summary, null, 2));
    if (summary.state === SyncState.CANCELLED) {
      process.exitCode = 130;
    }
  } finally {
    await store.close();
  }
}

main().catch((error: unknown) => {
  console.error(`Fatal error: ${errorMessage(error)}`);
  process.exit(1);
});
