#!/usr/bin/env node
// Entry point - load config, wire the container, serve the task form

import { createTaskFormServer, close, listen } from './boundary/http/task-form.server';
import { loadConfig } from './bootstrap/config';
import { ContainerFactory } from './bootstrap/container';
import { logger } from './shared/logger';

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const container = ContainerFactory.create(config);

  const server = createTaskFormServer(container.resolve('TaskFormController'));
  await listen(server, config.port);
  logger.info('main', 'Task form ready', { environment: config.environment });

  const shutdown = (signal: string): void => {
    logger.info('main', `Received ${signal}, shutting down`);
    close(server).then(
      () => process.exit(0),
      (error: unknown) => {
        logger.error('main', 'Shutdown failed', error instanceof Error ? error : null);
        process.exit(1);
      }
    );
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main().catch((error: unknown) => {
  logger.error('main', 'Startup failed', error instanceof Error ? error : null);
  process.exit(1);
});
