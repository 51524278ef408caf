import { loadConfig } from '@weighbridge/shared-config';

import { buildApp } from './app.js';

async function start() {
  const config = loadConfig();

  const app = await buildApp(config);

  try {
    await app.listen({
      port: config.api.port,
      host: config.api.host,
    });

    app.log.info(`API server listening on ${config.api.host}:${config.api.port}`);
  } catch (err) {
    app.log.error(err);
    process.exit(1);
  }
}

start().catch((err: unknown) => {
  console.error('Failed to start API server', err);
  process.exit(1);
});
