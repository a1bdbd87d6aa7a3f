#!/usr/bin/env node
import type { Server } from 'http';
import { env } from './env';
import { buildApp } from './app';
import { createAppContext } from './context';
import { logger } from './logger';
import { dataPaths } from './paths';

let server: Server | null = null;
let shuttingDown = false;

const context = createAppContext({
  env,
  paths: dataPaths,
  logger,
  onQuit: () => {
    shutdown('quit').catch((err: unknown) => {
      logger.error({ err }, 'Shutdown failed');
      process.exit(1);
    });
  }
});

const shutdown = async (reason: NodeJS.Signals | 'quit') => {
  if (shuttingDown) {
    return;
  }
  shuttingDown = true;
  logger.info({ reason }, 'Shutting down');
  await context.teardown();
  if (server) {
    server.close(() => process.exit(0));
  } else {
    process.exit(0);
  }
};

const start = async () => {
  const app = buildApp(context.controller);
  server = app.listen(env.CONTROL_PORT, env.CONTROL_HOST, () => {
    logger.info(`Control API listening on http://${env.CONTROL_HOST}:${env.CONTROL_PORT}`);
  });

  process.on('SIGTERM', (signal) => {
    shutdown(signal).catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });
  process.on('SIGINT', (signal) => {
    shutdown(signal).catch((err: unknown) => logger.error({ err }, 'Shutdown failed'));
  });

  await context.init();
};

start().catch((err) => {
  logger.error({ err }, 'Failed to start');
  process.exit(1);
});
