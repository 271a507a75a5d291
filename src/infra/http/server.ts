import type { Server } from 'http';
import dotenv from 'dotenv';
import { loadConfig } from '../config.js';
import { createLogger } from '../logger.js';
import { createPool } from '../db/pool.js';
import { startServer } from './bootstrap.js';

dotenv.config();

const config = loadConfig(process.env);
const logger = createLogger(config.logLevel);
const pool = createPool(config.database, logger);

let shuttingDown = false;

function closePool(): Promise<void> {
  return pool
    .end()
    .then(() => logger.info('Database pool closed'))
    .catch((err: unknown) => {
      logger.error({ err }, 'Error while closing database pool');
      process.exitCode = 1;
    });
}

function installShutdown(server: Server): void {
  const shutdown = (signal: NodeJS.Signals): void => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');

    server.close((closeError) => {
      if (closeError) {
        logger.error({ err: closeError }, 'Error while closing HTTP server');
        process.exitCode = 1;
      }
      void closePool();
    });
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

process.on('unhandledRejection', (reason) => {
  logger.fatal({ err: reason }, 'Unhandled promise rejection');
  process.exit(1);
});

startServer({ config, logger, pool })
  .then((server) => {
    logger.info({ port: config.port, env: config.env }, 'Server listening');
    logger.info(`Docs: http://localhost:${config.port}/docs`);
    installShutdown(server);
  })
  .catch((err: unknown) => {
    logger.fatal({ err }, 'Startup failed');
    process.exitCode = 1;
    return closePool();
  });
