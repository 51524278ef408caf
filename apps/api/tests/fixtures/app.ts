import { DEFAULT_SUBJECT_KEYWORD_GROUPS, type AppConfig } from '@weighbridge/shared-config';
import type { SourceMessage } from '@weighbridge/shared-types';
import Database from 'better-sqlite3';
import type { FastifyInstance } from 'fastify';
import { buildApp } from '../../src/app.js';
import { InMemoryMessageSource } from '../../src/sources/in-memory-message-source.js';
import type { MessageSource } from '../../src/sources/message-source.js';
import { SqliteReportStore } from '../../src/store/sqlite-report-store.js';
import { EXPECTED_SENDER } from './reports.js';

export const testConfig: AppConfig = {
  nodeEnv: 'test',
  isProduction: false,
  isDevelopment: false,
  api: { port: 3000, host: '127.0.0.1' },
  database: { path: ':memory:' },
  messageSource: { path: 'unused.json' },
  sync: {
    expectedSender: EXPECTED_SENDER,
    senderAliases: ['plant.example.com'],
    subjectKeywordGroups: DEFAULT_SUBJECT_KEYWORD_GROUPS,
    nominalBagWeight: 50,
  },
  sentry: { enabled: false },
  logging: { level: 'silent' },
  rateLimit: { max: 10000, window: 60000 },
  cors: { origin: 'http://localhost:3001' },
};

export interface TestApp {
  app: FastifyInstance;
  store: SqliteReportStore;
}

export async function buildTestApp(source: MessageSource | SourceMessage[] = []): Promise<TestApp> {
  const store = new SqliteReportStore(new Database(':memory:'));
  const messageSource = Array.isArray(source) ? new InMemoryMessageSource(source) : source;
  const app = await buildApp(testConfig, { store, messageSource });
  await app.ready();
  return { app, store };
}
