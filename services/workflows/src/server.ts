import process from 'node:process';

import { createApp } from './app';
import { ConfigError, loadConfig } from './config';
import type { WorkflowsConfig } from './config';

const readConfig = (): WorkflowsConfig => {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      // eslint-disable-next-line no-console
      console.error(error.message);
      process.exit(1);
    }
    throw error;
  }
};

const start = async () => {
  const config = readConfig();
  const { app, ctx } = await createApp(config);

  try {
    await app.listen({ port: config.port, host: config.host });
  } catch (error) {
    app.log.error({ err: error, port: config.port, host: config.host }, 'Failed to bind workflows service');
    await app.close();
    process.exit(1);
  }

  app.log.info(
    {
      address: `${config.host}:${config.port}`,
      readiness: ctx.readiness,
      demoUser: config.demoUserId,
      seeded: config.seedDemo
    },
    'Workflows service ready'
  );

  let closing = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (closing) {
      return;
    }
    closing = true;
    app.log.info({ signal }, 'Draining workflows service');
    try {
      await app.close();
      process.exit(0);
    } catch (error) {
      app.log.error({ err: error }, 'Workflows service did not close cleanly');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));
};

start().catch((error) => {
  // eslint-disable-next-line no-console
  console.error('Workflows service crashed during startup', error);
  process.exit(1);
});
