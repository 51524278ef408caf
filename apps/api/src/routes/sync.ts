import type { SyncHeuristicsConfig } from '@weighbridge/shared-config';
import { SyncRequestSchema } from '@weighbridge/shared-validation';
import { FastifyPluginAsync } from 'fastify';

import { SyncInProgressError } from '../errors.js';
import { SyncSession } from '../services/sync-session.service.js';
import type { MessageSource } from '../sources/message-source.js';
import { trackAsyncOperation } from '../utils/sentry.js';

export interface SyncRoutesOptions {
  source: MessageSource;
  heuristics: SyncHeuristicsConfig;
}

export const syncRoutes: FastifyPluginAsync<SyncRoutesOptions> = async (fastify, opts) => {
  // Sessions must not overlap against the same store
  let running = false;

  fastify.post('/', {
    schema: {
      description: 'Pull report messages for a date window and synchronize the store',
      tags: ['sync'],
    },
    handler: async (request) => {
      const window = SyncRequestSchema.parse(request.body);
      if (running) {
        throw new SyncInProgressError();
      }

      running = true;
      try {
        const session = new SyncSession({
          source: opts.source,
          synchronizer: fastify.synchronizer,
          heuristics: opts.heuristics,
          onStateChange: (state, previous) => {
            request.log.debug({ state, previous }, 'Sync state changed');
          },
        });
        return await trackAsyncOperation('sync.session', () => session.run(window), {
          fromDate: window.fromDate,
          toDate: window.toDate,
        });
      } finally {
        running = false;
      }
    },
  });
};
