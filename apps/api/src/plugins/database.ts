import { FastifyPluginAsync } from 'fastify';
import fp from 'fastify-plugin';

import { StoreSynchronizer } from '../services/store-sync.service.js';
import type { ReportStore } from '../store/report-store.js';
import { SqliteReportStore } from '../store/sqlite-report-store.js';

declare module 'fastify' {
  interface FastifyInstance {
    reportStore: ReportStore;
    synchronizer: StoreSynchronizer;
  }
}

export interface DatabasePluginOptions {
  /** SQLite file, or ":memory:" */
  databasePath: string;
  nominalBagWeight: number;
  /** Use this store instead of opening `databasePath` */
  store?: ReportStore;
}

/**
 * Opens the report store and runs the schema migration before the server
 * starts accepting requests. A failed migration aborts startup.
 */
const databasePlugin: FastifyPluginAsync<DatabasePluginOptions> = async (fastify, opts) => {
  const store = opts.store ?? SqliteReportStore.open(opts.databasePath);
  const synchronizer = new StoreSynchronizer(store, opts.nominalBagWeight);

  const migration = await synchronizer.initialize();
  fastify.log.info({ ...migration, databasePath: opts.store ? 'injected' : opts.databasePath }, 'Report store ready');

  fastify.decorate('reportStore', store);
  fastify.decorate('synchronizer', synchronizer);

  fastify.addHook('onClose', async (instance) => {
    await instance.reportStore.close();
  });
};

export default fp(databasePlugin);
export { databasePlugin };
