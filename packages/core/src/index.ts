#!/usr/bin/env node
import { getConfig, getDataDir } from './config.js';
import { DatabaseManager } from './db/index.js';
import { createEditorStack } from './editor/index.js';
import { createServerManager } from './server/index.js';
import { logger } from './logger.js';

async function main(): Promise<void> {
  const config = getConfig();

  logger.info('Lectern editor configuration daemon');
  logger.info({ dataDir: getDataDir() }, 'Data directory');
  logger.info({ port: config.port }, 'Starting daemon');

  const db = new DatabaseManager();
  const stack = createEditorStack(db, config);
  logger.info({ plugins: stack.registry.entries().map((p) => p.name) }, 'Editor plugins registered');

  const server = createServerManager(stack);
  await server.start(config.port);

  logger.info('Daemon ready');

  const shutdown = async () => {
    logger.info('Shutting down...');
    await server.stop();
    db.close();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.fatal({ err }, 'Shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);
  process.on('uncaughtException', (err) => {
    logger.fatal({ err }, 'Uncaught exception');
    process.exit(1);
  });
}

main().catch((error: unknown) => {
  logger.fatal({ err: error }, 'Fatal error');
  process.exit(1);
});
