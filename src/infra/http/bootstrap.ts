import type { Server } from 'http';
import type pg from 'pg';
import type { AppConfig } from '../config.js';
import type { Logger } from '../logger.js';
import { PgUserRepo } from '../db/userRepo.js';
import { runMigrations } from '../db/migrate.js';
import { JwtTokenService } from '../../application/auth/tokens.js';
import { createApp } from './app.js';

export type MigrationRunner = (pool: pg.Pool, logger: Logger) => Promise<number[]>;

export interface ServerDependencies {
  config: AppConfig;
  logger: Logger;
  pool: pg.Pool;
  migrate?: MigrationRunner;
}

/**
 * Bring the schema up to date, then listen. A failed migration rejects
 * before the port is bound.
 */
export async function startServer({
  config,
  logger,
  pool,
  migrate = runMigrations,
}: ServerDependencies): Promise<Server> {
  const applied = await migrate(pool, logger);
  if (applied.length > 0) {
    logger.info({ applied }, 'Schema migrated');
  }

  const tokens = new JwtTokenService({
    secret: config.jwt.secret,
    ttlSeconds: config.jwt.ttlSeconds,
  });

  const app = createApp({
    config,
    logger,
    userStore: new PgUserRepo(pool),
    tokenIssuer: tokens,
    tokenVerifier: tokens,
  });

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port);
    server.once('listening', () => {
      server.off('error', reject);
      resolve(server);
    });
    server.once('error', reject);
  });
}
