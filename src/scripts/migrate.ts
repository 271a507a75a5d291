import dotenv from 'dotenv';
import { loadConfig } from '../infra/config.js';
import { createLogger } from '../infra/logger.js';
import { createPool } from '../infra/db/pool.js';
import { runMigrations } from '../infra/db/migrate.js';

dotenv.config();

async function main(): Promise<void> {
  const config = loadConfig(process.env);
  const logger = createLogger(config.logLevel);
  const pool = createPool(config.database, logger);

  try {
    const applied = await runMigrations(pool, logger);
    logger.info({ applied }, 'Migrations complete');
  } catch (error) {
    logger.error({ err: error }, 'Migration failed');
    process.exitCode = 1;
  } finally {
    await pool.end();
  }
}

main().catch((error: unknown) => {
  // Config or logger failed to build; nothing structured to log through.
  console.error(error instanceof Error ? error.message : error);
  process.exitCode = 1;
});
