import Fastify, { FastifyInstance } from 'fastify';
import helmet from '@fastify/helmet';
import cors from '@fastify/cors';
import rateLimit from '@fastify/rate-limit';
import swagger from '@fastify/swagger';
import swaggerUi from '@fastify/swagger-ui';
import { AppConfig } from '@weighbridge/shared-config';

import { databasePlugin } from './plugins/database.js';
import { errorHandler } from './plugins/error-handler.js';
import { sentryPlugin } from './plugins/sentry.js';
import { healthRoute } from './routes/health.js';
import { reportRoutes } from './routes/reports.js';
import { syncRoutes } from './routes/sync.js';
import { JsonFileMessageSource } from './sources/json-file-message-source.js';
import type { MessageSource } from './sources/message-source.js';
import type { ReportStore } from './store/report-store.js';

export interface AppDependencies {
  /** Replaces the SQLite file named in the config */
  store?: ReportStore;
  /** Replaces the JSON mailbox export named in the config */
  messageSource?: MessageSource;
}

export async function buildApp(config: AppConfig, deps: AppDependencies = {}): Promise<FastifyInstance> {
  const app = Fastify({
    logger: {
      level: config.logging.level,
      transport: config.isDevelopment
        ? {
            target: 'pino-pretty',
            options: {
              translateTime: 'HH:MM:ss Z',
              ignore: 'pid,hostname',
            },
          }
        : undefined,
    },
  });

  // Security plugins
  await app.register(helmet);
  await app.register(cors, {
    origin: config.cors.origin,
  });
  await app.register(rateLimit, {
    max: config.rateLimit.max,
    timeWindow: config.rateLimit.window,
  });

  // Swagger documentation
  await app.register(swagger, {
    openapi: {
      info: {
        title: 'Weighbridge Sync API',
        description: 'Daily weigh-bridge delivery report synchronization',
        version: '0.1.0',
      },
      servers: [
        {
          url: `http://localhost:${config.api.port}`,
          description: 'Development server',
        },
      ],
    },
  });

  await app.register(swaggerUi, {
    routePrefix: '/docs',
    uiConfig: {
      docExpansion: 'list',
      deepLinking: false,
    },
  });

  // Custom plugins
  await app.register(databasePlugin, {
    databasePath: config.database.path,
    nominalBagWeight: config.sync.nominalBagWeight,
    store: deps.store,
  });
  if (config.sentry.enabled) {
    await app.register(sentryPlugin, {
      dsn: config.sentry.dsn,
      environment: config.sentry.environment,
      tracesSampleRate: config.sentry.tracesSampleRate,
    });
  }
  await app.register(errorHandler);

  // Routes
  await app.register(healthRoute);
  await app.register(syncRoutes, {
    prefix: '/sync',
    source: deps.messageSource ?? new JsonFileMessageSource(config.messageSource.path),
    heuristics: config.sync,
  });
  await app.register(reportRoutes, {
    prefix: '/reports',
    nominalBagWeight: config.sync.nominalBagWeight,
  });

  return app;
}
